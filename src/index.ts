import 'reflect-metadata';

export * from './db/types/index.js';
export * from './common/errors/game-errors.js';
export { GameConfigService, type GameConfig } from './common/config/game-config.service.js';
export { ConfigModule } from './common/config/config.module.js';

export { Rng, SequenceRng, RngService, type RandomSource } from './engine/rng/rng.service.js';
export { DIFFICULTY_TARGETS, targetFor } from './engine/dice/difficulty-table.js';
export {
  modifierFor,
  damageDiceFor,
  FUMBLE_SELF_DAMAGE_DICE,
  type DiceSpec,
} from './engine/dice/progression.js';
export {
  createResolutionResult,
  toResolutionPayload,
  CRITICAL_ROLL,
  FUMBLE_ROLL,
  type ResolutionInput,
} from './engine/dice/resolution-result.js';
export { ResolutionService } from './engine/dice/resolution.service.js';
export {
  NarrativeIntegrationService,
  INTEGRATION_RULES,
  classifyVerdict,
  copyStateChanges,
  type IntegrationRule,
  type ReconcileResult,
} from './engine/dice/narrative-integration.service.js';
export { classifyAction, DEFAULT_CHECK_CATEGORY } from './engine/dice/check-category.js';
export {
  CharacterStateService,
  experienceForNextLevel,
} from './engine/state/character-state.service.js';
export { GameStateService } from './engine/state/game-state.service.js';
export { EngineModule } from './engine/engine.module.js';

export * from './llm/types/index.js';
export { LlmModule } from './llm/llm.module.js';
export { NarrativeGeneratorService } from './llm/narrative-generator.service.js';
export {
  LlmConfigService,
  type LlmConfigPatch,
  type LlmConfigPublic,
} from './llm/llm-config.service.js';

export { DrizzleModule, DB, type DrizzleDB } from './db/drizzle.module.js';
export * from './turns/turn.ports.js';
export { ActionTurnService } from './turns/action-turn.service.js';
export { TurnsModule } from './turns/turns.module.js';
export type { ProcessActionInput } from './turns/dto/process-action.dto.js';
export type { TurnResult } from './turns/dto/turn-result.dto.js';
export { AppModule } from './app.module.js';
