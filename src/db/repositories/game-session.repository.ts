import { Inject, Injectable } from '@nestjs/common';
import { and, eq } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../drizzle.module.js';
import { characters, gameSessions, scenarios } from '../schema/index.js';
import {
  EMPTY_GAME_STATE,
  type GameSessionSnapshot,
  type ScenarioSnapshot,
  type TurnCommit,
} from '../types/index.js';
import type { GameSessionRepository } from '../../turns/turn.ports.js';
import { InvalidInputError } from '../../common/errors/game-errors.js';

@Injectable()
export class DrizzleGameSessionRepository implements GameSessionRepository {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async findById(sessionId: string): Promise<GameSessionSnapshot | null> {
    const row = await this.db.query.gameSessions.findFirst({
      where: eq(gameSessions.id, sessionId),
    });
    if (!row) return null;
    return {
      id: row.id,
      characterId: row.characterId,
      scenarioId: row.scenarioId,
      status: row.status,
      currentLocation: row.currentLocation,
      gameState: row.gameState ?? EMPTY_GAME_STATE,
    };
  }

  async findScenario(scenarioId: string): Promise<ScenarioSnapshot | null> {
    const row = await this.db.query.scenarios.findFirst({
      where: eq(scenarios.id, scenarioId),
      columns: { id: true, name: true, worldSetting: true, difficulty: true },
    });
    return row ?? null;
  }

  /**
   * 세션 갱신을 먼저 하고 ACTIVE 조건으로 잠근다.
   * 그 사이 다른 턴이 세션을 종료했다면 캐릭터는 건드리지 않고 롤백.
   */
  async commitTurn(commit: TurnCommit): Promise<void> {
    const now = new Date();
    const { character } = commit;

    await this.db.transaction(async (tx) => {
      const updated = await tx
        .update(gameSessions)
        .set({
          currentLocation: commit.currentLocation,
          gameState: commit.gameState,
          lastActivityAt: now,
          ...(commit.endingType
            ? { status: 'COMPLETED' as const, endingType: commit.endingType }
            : {}),
        })
        .where(
          and(
            eq(gameSessions.id, commit.sessionId),
            eq(gameSessions.status, 'ACTIVE'),
          ),
        )
        .returning({ id: gameSessions.id });

      if (updated.length === 0) {
        throw new InvalidInputError('Session is not active', {
          sessionId: commit.sessionId,
        });
      }

      await tx
        .update(characters)
        .set({
          level: character.level,
          hp: character.hp,
          maxHp: character.maxHp,
          experience: character.experience,
          currentExperience: character.currentExperience,
          inventory: character.inventory,
          updatedAt: now,
        })
        .where(eq(characters.id, character.id));
    });
  }
}
