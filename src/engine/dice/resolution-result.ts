// ResolutionResult 생성 — 파생 필드(total/성공/치명/대실패/summary)는 여기서만 계산

import {
  isCheckCategory,
  type CheckCategory,
  type ResolutionPayload,
  type ResolutionResult,
} from '../../db/types/index.js';
import { invariant } from '../../common/errors/game-errors.js';

export const CRITICAL_ROLL = 20;
export const FUMBLE_ROLL = 1;

export interface ResolutionInput {
  roll: number;
  modifier: number;
  target: number;
  category: CheckCategory;
  damage: number | null;
}

const OUTCOME_LABEL = {
  critical: '대성공!',
  fumble: '대실패!',
  success: '성공!',
  failure: '실패...',
} as const;

export function createResolutionResult(input: ResolutionInput): ResolutionResult {
  const { roll, modifier, target, category, damage } = input;

  invariant(
    Number.isInteger(roll) && roll >= FUMBLE_ROLL && roll <= CRITICAL_ROLL,
    `Roll out of range: ${roll}`,
  );
  invariant(Number.isInteger(modifier) && modifier >= 0, `Invalid modifier ${modifier}`);
  invariant(Number.isInteger(target) && target >= 1, `Invalid target ${target}`);
  invariant(isCheckCategory(category), `Unknown check category "${String(category)}"`);

  const isCritical = roll === CRITICAL_ROLL;
  const isFumble = roll === FUMBLE_ROLL;
  const total = roll + modifier;
  const isSuccess = isCritical ? true : isFumble ? false : total >= target;

  // 피해는 치명타/대실패일 때만 존재
  if (isCritical || isFumble) {
    invariant(
      damage !== null && Number.isInteger(damage) && damage >= 0,
      `Damage required for roll ${roll}`,
      { damage },
    );
  } else {
    invariant(damage === null, `Unexpected damage for roll ${roll}`, { damage });
  }

  const result: ResolutionResult = {
    roll,
    modifier,
    total,
    target,
    isSuccess,
    isCritical,
    isFumble,
    category,
    damage,
    summary: formatSummary(roll, modifier, total, target, isCritical, isFumble, isSuccess),
  };
  return Object.freeze(result);
}

function formatSummary(
  roll: number,
  modifier: number,
  total: number,
  target: number,
  isCritical: boolean,
  isFumble: boolean,
  isSuccess: boolean,
): string {
  const label = isCritical
    ? OUTCOME_LABEL.critical
    : isFumble
      ? OUTCOME_LABEL.fumble
      : isSuccess
        ? OUTCOME_LABEL.success
        : OUTCOME_LABEL.failure;
  return `🎲 1d20+${modifier} = ${total} vs DC ${target} → ${label}`;
}

/** 응답 페이로드 변환: target은 dc로 노출 */
export function toResolutionPayload(result: ResolutionResult): ResolutionPayload {
  return {
    roll: result.roll,
    modifier: result.modifier,
    total: result.total,
    dc: result.target,
    isSuccess: result.isSuccess,
    isCritical: result.isCritical,
    isFumble: result.isFumble,
    category: result.category,
    damage: result.damage,
    summary: result.summary,
  };
}
