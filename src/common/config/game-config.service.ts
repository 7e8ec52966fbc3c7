// 게임 규칙 설정 — .env 기본값

import { Injectable, Logger } from '@nestjs/common';
import { type DifficultyTier, isDifficultyTier } from '../../db/types/index.js';
import { InvalidInputError } from '../errors/game-errors.js';

export interface GameConfig {
  defaultDifficulty: DifficultyTier;
  databaseUrl: string;
}

@Injectable()
export class GameConfigService {
  private readonly logger = new Logger(GameConfigService.name);
  private readonly config: GameConfig;

  constructor() {
    this.config = GameConfigService.load(process.env);
    this.logger.log(`Default difficulty: ${this.config.defaultDifficulty}`);
  }

  /** 잘못된 난이도 값은 기동 시점에 거부 */
  static load(env: NodeJS.ProcessEnv): GameConfig {
    const rawDifficulty = env.DEFAULT_DIFFICULTY ?? 'NORMAL';
    if (!isDifficultyTier(rawDifficulty)) {
      throw new InvalidInputError(`Invalid DEFAULT_DIFFICULTY "${rawDifficulty}"`);
    }
    return {
      defaultDifficulty: rawDifficulty,
      databaseUrl: env.DATABASE_URL ?? '',
    };
  }

  get(): GameConfig {
    return this.config;
  }
}
