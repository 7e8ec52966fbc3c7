// 서술 생성기 LLM 설정 — .env 기본값 + 런타임 변경

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import type { LlmConfig } from './types/index.js';
import { InvalidInputError } from '../common/errors/game-errors.js';

// 숫자 설정은 기동/변경 시점에 검증 (NaN이면 호출 루프가 돌지 않는다)
const NumericSettingsSchema = z.object({
  maxRetries: z.number().int().min(0),
  timeoutMs: z.number().int().positive(),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
});

/** 런타임에 바꿀 수 있는 필드 (API 키 제외) */
export type LlmConfigPatch = Partial<
  Pick<
    LlmConfig,
    | 'provider'
    | 'openaiModel'
    | 'claudeModel'
    | 'geminiModel'
    | 'maxRetries'
    | 'timeoutMs'
    | 'maxTokens'
    | 'temperature'
    | 'fallbackProvider'
  >
>;

/** 공개용 설정: API 키는 설정 여부만 */
export type LlmConfigPublic = Omit<
  LlmConfig,
  'openaiApiKey' | 'claudeApiKey' | 'geminiApiKey'
> & {
  openaiApiKeySet: boolean;
  claudeApiKeySet: boolean;
  geminiApiKeySet: boolean;
  availableProviders: string[];
};

@Injectable()
export class LlmConfigService {
  private readonly logger = new Logger(LlmConfigService.name);
  private config: LlmConfig;

  constructor() {
    this.config = LlmConfigService.load(process.env);
  }

  static load(env: NodeJS.ProcessEnv): LlmConfig {
    return LlmConfigService.validate({
      provider: env.LLM_PROVIDER ?? 'mock',
      openaiApiKey: env.OPENAI_API_KEY ?? '',
      openaiModel: env.OPENAI_MODEL ?? 'gpt-4o',
      claudeApiKey: env.CLAUDE_API_KEY ?? '',
      claudeModel: env.CLAUDE_MODEL ?? 'claude-sonnet-4-5-20250929',
      geminiApiKey: env.GEMINI_API_KEY ?? '',
      geminiModel: env.GEMINI_MODEL ?? 'gemini-2.0-flash',
      maxRetries: Number(env.LLM_MAX_RETRIES ?? '2'),
      timeoutMs: Number(env.LLM_TIMEOUT_MS ?? '8000'),
      maxTokens: Number(env.LLM_MAX_TOKENS ?? '1024'),
      temperature: Number(env.LLM_TEMPERATURE ?? '0.8'),
      fallbackProvider: env.LLM_FALLBACK_PROVIDER ?? 'mock',
    });
  }

  private static validate(config: LlmConfig): LlmConfig {
    const parsed = NumericSettingsSchema.safeParse(config);
    if (!parsed.success) {
      throw new InvalidInputError('Invalid LLM config', {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return config;
  }

  get(): LlmConfig {
    return this.config;
  }

  /** 다음 서술 생성 호출부터 반영 */
  update(patch: LlmConfigPatch): LlmConfig {
    this.config = LlmConfigService.validate({ ...this.config, ...patch });
    this.logger.log(`LLM config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }

  getPublic(): LlmConfigPublic {
    const { openaiApiKey, claudeApiKey, geminiApiKey, ...rest } = this.config;
    return {
      ...rest,
      openaiApiKeySet: openaiApiKey.length > 0,
      claudeApiKeySet: claudeApiKey.length > 0,
      geminiApiKeySet: geminiApiKey.length > 0,
      availableProviders: this.availableProviders(),
    };
  }

  /** API 키가 설정된 공급자 목록 (mock은 항상 포함) */
  availableProviders(): string[] {
    const providers = ['mock'];
    if (this.config.openaiApiKey) providers.push('openai');
    if (this.config.claudeApiKey) providers.push('claude');
    if (this.config.geminiApiKey) providers.push('gemini');
    return providers;
  }
}
