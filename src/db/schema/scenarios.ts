import { pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';
import { DIFFICULTY_TIER } from '../types/index.js';

export const scenarios = pgTable('scenarios', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull(),
  description: text('description').notNull().default(''),
  worldSetting: text('world_setting').notNull().default(''),
  initialLocation: text('initial_location').notNull(),
  // null이면 GameConfigService 기본 난이도
  difficulty: text('difficulty', { enum: DIFFICULTY_TIER }),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});
