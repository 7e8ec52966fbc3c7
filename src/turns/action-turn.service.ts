// 플레이어 액션 1회 처리: 판정 → 서술 생성(1회) → 조정 → 적용 → 종료 판정 → 커밋

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  InvalidInputError,
  NotFoundError,
} from '../common/errors/game-errors.js';
import { GameConfigService } from '../common/config/game-config.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { ResolutionService } from '../engine/dice/resolution.service.js';
import { NarrativeIntegrationService } from '../engine/dice/narrative-integration.service.js';
import { toResolutionPayload } from '../engine/dice/resolution-result.js';
import { classifyAction } from '../engine/dice/check-category.js';
import { CharacterStateService } from '../engine/state/character-state.service.js';
import { GameStateService } from '../engine/state/game-state.service.js';
import type { NarrativeGenerator } from '../llm/types/index.js';
import type { DifficultyTier } from '../db/types/index.js';
import {
  CHARACTER_REPOSITORY,
  GAME_SESSION_REPOSITORY,
  NARRATIVE_GENERATOR,
  type CharacterRepository,
  type GameSessionRepository,
} from './turn.ports.js';
import {
  ProcessActionInputSchema,
  type ProcessActionInput,
} from './dto/process-action.dto.js';
import type { TurnResult } from './dto/turn-result.dto.js';

export const DEATH_EPILOGUE =
  '\n\n당신의 몸이 더 이상 버티지 못합니다. 시야가 흐려지고, 모험은 여기서 끝납니다. (사망)';

@Injectable()
export class ActionTurnService {
  private readonly logger = new Logger(ActionTurnService.name);

  constructor(
    @Inject(CHARACTER_REPOSITORY) private readonly characters: CharacterRepository,
    @Inject(GAME_SESSION_REPOSITORY) private readonly sessions: GameSessionRepository,
    @Inject(NARRATIVE_GENERATOR) private readonly narrator: NarrativeGenerator,
    private readonly config: GameConfigService,
    private readonly rngService: RngService,
    private readonly resolutionService: ResolutionService,
    private readonly integration: NarrativeIntegrationService,
    private readonly characterState: CharacterStateService,
    private readonly gameState: GameStateService,
  ) {}

  async processAction(rawInput: ProcessActionInput): Promise<TurnResult> {
    const parsedInput = ProcessActionInputSchema.safeParse(rawInput);
    if (!parsedInput.success) {
      throw new InvalidInputError('Validation failed', {
        issues: parsedInput.error.issues.map(
          (i) => `${i.path.join('.')}: ${i.message}`,
        ),
      });
    }
    const input = parsedInput.data;

    // 1. 세션/캐릭터/난이도 로드
    const session = await this.sessions.findById(input.sessionId);
    if (!session) throw new NotFoundError('Session not found');
    if (session.status !== 'ACTIVE') {
      throw new InvalidInputError('Session is not active', {
        status: session.status,
      });
    }

    const character = await this.characters.findById(session.characterId);
    if (!character) {
      throw new NotFoundError('Character not found', {
        characterId: session.characterId,
      });
    }

    const scenario = await this.sessions.findScenario(session.scenarioId);
    const tier: DifficultyTier =
      scenario?.difficulty ?? this.config.get().defaultDifficulty;

    // 2. 판정 — 서술 생성 호출 전에 확정
    const category = input.category ?? classifyAction(input.action);
    const resolution = this.resolutionService.performCheck(
      character.level,
      tier,
      category,
      this.rngService.forAction(),
    );

    // 3. 서술 생성 (실패 시 판정은 버려지고 아무것도 저장되지 않는다)
    const narrative = await this.narrator.generate({
      scenario,
      session,
      character,
      action: input.action,
      resolution,
    });

    // 4. 조정 + 적용
    const reconciled = this.integration.reconcile(
      resolution,
      narrative.mechanicsApplied,
      narrative.stateChanges,
    );
    const updatedCharacter = this.characterState.apply(
      character,
      reconciled.stateChanges,
      reconciled.selfDamage,
    );
    const updatedGameState = this.gameState.apply(
      session.gameState,
      reconciled.stateChanges,
    );
    const currentLocation =
      reconciled.stateChanges.location ?? session.currentLocation;

    // 5. 종료 판정 — 적용 후 자원 확인
    const isTerminated = this.characterState.isDepleted(updatedCharacter);
    if (isTerminated) {
      this.logger.log(
        `Character ${character.id} died (hp ${updatedCharacter.hp}) in session ${session.id}`,
      );
    }

    await this.sessions.commitTurn({
      sessionId: session.id,
      character: updatedCharacter,
      currentLocation,
      gameState: updatedGameState,
      endingType: isTerminated ? 'DEFEAT' : null,
    });

    return {
      narrative: isTerminated
        ? `${narrative.narrative}${DEATH_EPILOGUE}`
        : narrative.narrative,
      options: isTerminated ? [] : narrative.options,
      resolution: reconciled.surfacedResolution
        ? toResolutionPayload(reconciled.surfacedResolution)
        : null,
      verdict: reconciled.verdict,
      stateChanges: reconciled.stateChanges,
      character: updatedCharacter,
      isTerminated,
    };
  }
}
