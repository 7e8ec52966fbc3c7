// 턴 처리 협력자 포트 — 영속화/서술 생성은 바깥 책임

import type {
  CharacterState,
  GameSessionSnapshot,
  ScenarioSnapshot,
  TurnCommit,
} from '../db/types/index.js';

export const CHARACTER_REPOSITORY = Symbol('CHARACTER_REPOSITORY');
export const GAME_SESSION_REPOSITORY = Symbol('GAME_SESSION_REPOSITORY');
export const NARRATIVE_GENERATOR = Symbol('NARRATIVE_GENERATOR');

export interface CharacterRepository {
  findById(characterId: string): Promise<CharacterState | null>;
}

export interface GameSessionRepository {
  findById(sessionId: string): Promise<GameSessionSnapshot | null>;
  findScenario(scenarioId: string): Promise<ScenarioSnapshot | null>;
  /**
   * 캐릭터 + 세션 + 종료 여부를 한 트랜잭션으로 반영.
   * 커밋 시점에 세션이 ACTIVE가 아니면 InvalidInputError, 아무것도 쓰지 않는다.
   */
  commitTurn(commit: TurnCommit): Promise<void>;
}
