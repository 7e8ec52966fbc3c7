import type {
  CharacterState,
  IntegrationVerdict,
  ResolutionPayload,
  StateChanges,
} from '../../db/types/index.js';

export type TurnResult = {
  narrative: string;
  options: string[];
  /** 비판정 행동이면 null */
  resolution: ResolutionPayload | null;
  verdict: IntegrationVerdict;
  stateChanges: StateChanges;
  character: CharacterState;
  isTerminated: boolean;
};
