import {
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import { ENDING_TYPE, SESSION_STATUS } from '../types/index.js';
import type { GameState } from '../types/index.js';
import { characters } from './characters.js';
import { scenarios } from './scenarios.js';

export const gameSessions = pgTable(
  'game_sessions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id').notNull(),
    characterId: uuid('character_id')
      .notNull()
      .references(() => characters.id),
    scenarioId: uuid('scenario_id')
      .notNull()
      .references(() => scenarios.id),
    status: text('status', { enum: SESSION_STATUS })
      .notNull()
      .default('ACTIVE'),
    currentLocation: text('current_location').notNull(),
    gameState: jsonb('game_state').$type<GameState>(),
    endingType: text('ending_type', { enum: ENDING_TYPE }),
    startedAt: timestamp('started_at').defaultNow().notNull(),
    lastActivityAt: timestamp('last_activity_at').defaultNow().notNull(),
  },
  (table) => [
    index('game_sessions_user_status_idx').on(table.userId, table.status),
  ],
);
