// 서술 생성기 입출력

import type {
  CharacterState,
  GameSessionSnapshot,
  ResolutionResult,
  ScenarioSnapshot,
  StateChanges,
} from '../../db/types/index.js';

export interface NarrativeRequest {
  scenario: ScenarioSnapshot | null;
  session: GameSessionSnapshot;
  character: CharacterState;
  action: string;
  resolution: ResolutionResult;
}

export interface NarrativeResponse {
  narrative: string;
  options: string[];
  stateChanges: StateChanges;
  /** 생성기가 판정을 서술에 적용했다고 보고했는가 (누락 시 false) */
  mechanicsApplied: boolean;
  /** 구조화 응답 파싱 성공 여부 */
  structured: boolean;
}

/** 서술 생성기 포트: 판정 결과를 입력 컨텍스트로 받아 한 번 호출된다 */
export interface NarrativeGenerator {
  generate(request: NarrativeRequest): Promise<NarrativeResponse>;
}
