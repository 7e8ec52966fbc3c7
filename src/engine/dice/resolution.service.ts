import { Injectable, Logger } from '@nestjs/common';
import type {
  CheckCategory,
  DifficultyTier,
  ResolutionResult,
} from '../../db/types/index.js';
import type { RandomSource } from '../rng/rng.service.js';
import { targetFor } from './difficulty-table.js';
import {
  damageDiceFor,
  modifierFor,
  FUMBLE_SELF_DAMAGE_DICE,
  type DiceSpec,
} from './progression.js';
import {
  createResolutionResult,
  CRITICAL_ROLL,
  FUMBLE_ROLL,
} from './resolution-result.js';

@Injectable()
export class ResolutionService {
  private readonly logger = new Logger(ResolutionService.name);

  /**
   * d20 판정: d20 + modifier(level) >= DC(tier)
   * - 20 = 자동 성공, 레벨 피해 주사위 개수 2배로 굴려 합산
   * - 1 = 자동 실패, 1d4 자해 피해
   * - 그 외에는 피해 없음
   *
   * 난수 소비 순서: d20 1회 → (치명/대실패 시) 피해 주사위 개수만큼
   */
  performCheck(
    level: number,
    tier: DifficultyTier,
    category: CheckCategory,
    rng: RandomSource,
  ): ResolutionResult {
    // 계약 검사를 난수 소비보다 먼저
    const modifier = modifierFor(level);
    const target = targetFor(tier);

    const roll = rng.range(FUMBLE_ROLL, CRITICAL_ROLL);

    let damage: number | null = null;
    if (roll === CRITICAL_ROLL) {
      const dice = damageDiceFor(level);
      damage = this.rollDice({ count: dice.count * 2, faces: dice.faces }, rng);
    } else if (roll === FUMBLE_ROLL) {
      damage = this.rollDice(FUMBLE_SELF_DAMAGE_DICE, rng);
    }

    const result = createResolutionResult({
      roll,
      modifier,
      target,
      category,
      damage,
    });
    this.logger.debug(
      `Lv${level} ${tier} ${category}: ${result.summary}${damage !== null ? ` (damage ${damage})` : ''}`,
    );
    return result;
  }

  /** 주사위를 하나씩 굴려 합산 (결과값 배수 금지) */
  rollDice(dice: DiceSpec, rng: RandomSource): number {
    let sum = 0;
    for (let i = 0; i < dice.count; i++) {
      sum += rng.range(1, dice.faces);
    }
    return sum;
  }
}
