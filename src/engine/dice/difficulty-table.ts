// 난이도 → 목표값(DC) 매핑

import type { DifficultyTier } from '../../db/types/index.js';
import { ContractViolationError } from '../../common/errors/game-errors.js';

export const DIFFICULTY_TARGETS = {
  EASY: 8,
  NORMAL: 12,
  HARD: 15,
  NIGHTMARE: 18,
} as const satisfies Record<DifficultyTier, number>;

export function targetFor(tier: DifficultyTier): number {
  // 외부 문자열이 타입 검사를 우회해 들어온 경우
  if (!Object.prototype.hasOwnProperty.call(DIFFICULTY_TARGETS, tier)) {
    throw new ContractViolationError(`Unknown difficulty tier "${String(tier)}"`);
  }
  return DIFFICULTY_TARGETS[tier];
}
