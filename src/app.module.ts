import { Module } from '@nestjs/common';
import { ConfigModule } from './common/config/config.module.js';
import { DrizzleModule } from './db/drizzle.module.js';
import { EngineModule } from './engine/engine.module.js';
import { LlmModule } from './llm/llm.module.js';
import { TurnsModule } from './turns/turns.module.js';

@Module({
  imports: [ConfigModule, DrizzleModule, EngineModule, LlmModule, TurnsModule],
})
export class AppModule {}
