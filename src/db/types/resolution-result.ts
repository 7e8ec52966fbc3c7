// d20 판정 결과 — 액션마다 새로 만들고, 저장하지 않는다

import type { CheckCategory } from './enums.js';

export type ResolutionResult = {
  readonly roll: number; // 1~20
  readonly modifier: number;
  readonly total: number; // roll + modifier
  readonly target: number; // DC
  readonly isSuccess: boolean;
  readonly isCritical: boolean; // roll === 20
  readonly isFumble: boolean; // roll === 1
  readonly category: CheckCategory;
  readonly damage: number | null; // 치명타 피해 또는 대실패 자해 피해
  readonly summary: string;
};

/** 응답 페이로드. 비판정 행동이면 페이로드 대신 null */
export type ResolutionPayload = {
  roll: number;
  modifier: number;
  total: number;
  dc: number;
  isSuccess: boolean;
  isCritical: boolean;
  isFumble: boolean;
  category: CheckCategory;
  damage: number | null;
  summary: string;
};
