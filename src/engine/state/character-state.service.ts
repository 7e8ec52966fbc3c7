// 조정된 상태 변경을 캐릭터 스냅샷에 적용 — 항상 새 객체 반환

import { Injectable, Logger } from '@nestjs/common';
import type { CharacterState, StateChanges } from '../../db/types/index.js';
import { invariant } from '../../common/errors/game-errors.js';

const EXPERIENCE_PER_LEVEL = 100;
const MAX_HP_PER_LEVEL_UP = 10;

export function experienceForNextLevel(level: number): number {
  return level * EXPERIENCE_PER_LEVEL;
}

@Injectable()
export class CharacterStateService {
  private readonly logger = new Logger(CharacterStateService.name);

  /**
   * 적용 순서: 경험치(레벨업 풀회복) → hpChange → 자해 피해 → 아이템
   * 레벨업 회복이 같은 턴의 사망을 덮지 않도록 피해를 마지막에 적용한다.
   */
  apply(
    character: CharacterState,
    changes: StateChanges,
    selfDamage: number = 0,
  ): CharacterState {
    invariant(
      Number.isInteger(selfDamage) && selfDamage >= 0,
      `Invalid self-damage ${selfDamage}`,
    );

    let next: CharacterState = { ...character, inventory: [...character.inventory] };

    if (changes.experienceGained > 0) {
      next = this.gainExperience(next, changes.experienceGained);
    }

    if (changes.hpChange > 0) {
      next = this.heal(next, changes.hpChange);
    } else if (changes.hpChange < 0) {
      next = this.takeDamage(next, -changes.hpChange);
    }

    if (selfDamage > 0) {
      next = this.takeDamage(next, selfDamage);
    }

    for (const item of changes.itemsGained) {
      if (!next.inventory.includes(item)) next.inventory.push(item);
    }
    if (changes.itemsLost.length > 0) {
      const lost = new Set(changes.itemsLost);
      next.inventory = next.inventory.filter((item) => !lost.has(item));
    }

    return next;
  }

  /** 하한 없음. 0 이하 판정은 isDepleted */
  takeDamage(character: CharacterState, amount: number): CharacterState {
    return { ...character, hp: character.hp - amount };
  }

  heal(character: CharacterState, amount: number): CharacterState {
    return { ...character, hp: Math.min(character.maxHp, character.hp + amount) };
  }

  /** 필요 경험치 = level × 100, 초과분은 다음 레벨로 이월 (다중 레벨업 가능) */
  gainExperience(character: CharacterState, amount: number): CharacterState {
    let next: CharacterState = {
      ...character,
      experience: character.experience + amount,
      currentExperience: character.currentExperience + amount,
    };
    while (next.currentExperience >= experienceForNextLevel(next.level)) {
      next = this.levelUp({
        ...next,
        currentExperience: next.currentExperience - experienceForNextLevel(next.level),
      });
    }
    return next;
  }

  /** maxHp +10, 풀회복 */
  levelUp(character: CharacterState): CharacterState {
    const maxHp = character.maxHp + MAX_HP_PER_LEVEL_UP;
    this.logger.log(
      `[LEVEL UP] ${character.name}: Lv${character.level} → Lv${character.level + 1} (maxHp ${maxHp})`,
    );
    return { ...character, level: character.level + 1, maxHp, hp: maxHp };
  }

  isDepleted(character: CharacterState): boolean {
    return character.hp <= 0;
  }
}
