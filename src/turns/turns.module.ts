import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { LlmModule } from '../llm/llm.module.js';
import { NarrativeGeneratorService } from '../llm/narrative-generator.service.js';
import { DrizzleCharacterRepository } from '../db/repositories/character.repository.js';
import { DrizzleGameSessionRepository } from '../db/repositories/game-session.repository.js';
import { ActionTurnService } from './action-turn.service.js';
import {
  CHARACTER_REPOSITORY,
  GAME_SESSION_REPOSITORY,
  NARRATIVE_GENERATOR,
} from './turn.ports.js';

@Module({
  imports: [EngineModule, LlmModule],
  providers: [
    ActionTurnService,
    { provide: CHARACTER_REPOSITORY, useClass: DrizzleCharacterRepository },
    { provide: GAME_SESSION_REPOSITORY, useClass: DrizzleGameSessionRepository },
    { provide: NARRATIVE_GENERATOR, useExisting: NarrativeGeneratorService },
  ],
  exports: [ActionTurnService],
})
export class TurnsModule {}
