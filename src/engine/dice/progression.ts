// 레벨 기반 수정치 / 피해 주사위 — 순수 함수

import { invariant } from '../../common/errors/game-errors.js';

export interface DiceSpec {
  count: number;
  faces: number;
}

/** 피해 주사위 구간: 상한 레벨 이하이면 해당 면수. 마지막 구간은 상한 없음 */
const DAMAGE_DICE_BANDS: ReadonlyArray<{ maxLevel: number; faces: number }> = [
  { maxLevel: 2, faces: 4 },
  { maxLevel: 4, faces: 6 },
  { maxLevel: 6, faces: 8 },
  { maxLevel: 8, faces: 10 },
  { maxLevel: Number.POSITIVE_INFINITY, faces: 12 },
];

function assertLevel(level: number): void {
  invariant(Number.isInteger(level) && level >= 1, `Invalid level ${level}`, {
    level,
  });
}

/**
 * 판정 수정치: floor((level - 1) / 4) + 2
 * Lv1-4: +2, Lv5-8: +3, Lv9-12: +4, ...
 */
export function modifierFor(level: number): number {
  assertLevel(level);
  return Math.floor((level - 1) / 4) + 2;
}

export function damageDiceFor(level: number): DiceSpec {
  assertLevel(level);
  const band = DAMAGE_DICE_BANDS.find((b) => level <= b.maxLevel);
  // 마지막 구간이 Infinity라 항상 찾는다
  invariant(band !== undefined, `No damage band for level ${level}`);
  return { count: 1, faces: band.faces };
}

/** 대실패 자해 피해: 레벨 무관 1d4 */
export const FUMBLE_SELF_DAMAGE_DICE: DiceSpec = { count: 1, faces: 4 };
