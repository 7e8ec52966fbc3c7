import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { ResolutionService } from './dice/resolution.service.js';
import { NarrativeIntegrationService } from './dice/narrative-integration.service.js';
import { CharacterStateService } from './state/character-state.service.js';
import { GameStateService } from './state/game-state.service.js';

const providers = [
  // 난수원
  RngService,
  // 판정
  ResolutionService,
  NarrativeIntegrationService,
  // 상태 적용
  CharacterStateService,
  GameStateService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
