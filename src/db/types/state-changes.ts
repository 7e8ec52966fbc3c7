// 서술 생성기가 제안하는 상태 변경 묶음 (불변)

export type StateChanges = {
  readonly hpChange: number;
  readonly experienceGained: number;
  readonly itemsGained: readonly string[];
  readonly itemsLost: readonly string[];
  readonly location: string | null;
  readonly npcsMet: readonly string[];
  readonly discoveries: readonly string[];
};

export const EMPTY_STATE_CHANGES: StateChanges = Object.freeze({
  hpChange: 0,
  experienceGained: 0,
  itemsGained: Object.freeze([]),
  itemsLost: Object.freeze([]),
  location: null,
  npcsMet: Object.freeze([]),
  discoveries: Object.freeze([]),
});

/** 세션에 누적되는 게임 상태 */
export type GameState = {
  items: string[];
  visitedLocations: string[];
  metNpcs: string[];
  discoveries: string[];
};

export const EMPTY_GAME_STATE: GameState = {
  items: [],
  visitedLocations: [],
  metNpcs: [],
  discoveries: [],
};
