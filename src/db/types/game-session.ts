import type { CharacterState } from './character-state.js';
import type { DifficultyTier, EndingType, SessionStatus } from './enums.js';
import type { GameState } from './state-changes.js';

export type GameSessionSnapshot = {
  id: string;
  characterId: string;
  scenarioId: string;
  status: SessionStatus;
  currentLocation: string;
  gameState: GameState;
};

export type ScenarioSnapshot = {
  id: string;
  name: string;
  worldSetting: string;
  difficulty: DifficultyTier | null;
};

/** 한 턴의 결과를 원자적으로 반영하기 위한 묶음 */
export type TurnCommit = {
  sessionId: string;
  character: CharacterState;
  currentLocation: string;
  gameState: GameState;
  endingType: EndingType | null; // null이면 세션 유지
};
