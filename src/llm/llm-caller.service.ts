// LLM 호출 서비스 — 재시도 + fallback 전략

import { Injectable, Logger } from '@nestjs/common';
import { LlmProviderRegistryService } from './providers/llm-provider-registry.service.js';
import { LlmConfigService } from './llm-config.service.js';
import type {
  ErrorCategory,
  LlmCallResult,
  LlmProvider,
  LlmProviderRequest,
} from './types/index.js';

@Injectable()
export class LlmCallerService {
  private readonly logger = new Logger(LlmCallerService.name);

  constructor(
    private readonly registry: LlmProviderRegistryService,
    private readonly configService: LlmConfigService,
  ) {}

  /**
   * 1) Primary: RETRYABLE 실패면 maxRetries 회까지 시도
   * 2) Fallback: Primary와 다른 공급자일 때만 1회
   */
  async call(request: LlmProviderRequest): Promise<LlmCallResult> {
    const maxAttempts = Math.max(1, this.configService.get().maxRetries);
    const primary = this.registry.getPrimary();
    let attempts = 0;

    while (attempts < maxAttempts) {
      attempts++;
      try {
        const response = await primary.generate(request);
        return { success: true, response, providerUsed: primary.name, attempts };
      } catch (err) {
        const category = this.classifyError(err);
        this.logger.warn(
          `Primary "${primary.name}" attempt ${attempts} failed (${category}): ${String(err)}`,
        );
        if (category === 'PERMANENT') break;
      }
    }

    const fallback = this.registry.getFallback();
    if (fallback.name === primary.name) {
      return {
        success: false,
        error: `Primary "${primary.name}" failed after ${attempts} attempts, no distinct fallback`,
        providerUsed: primary.name,
        attempts,
      };
    }

    attempts++;
    return this.callFallback(fallback, request, attempts);
  }

  private async callFallback(
    fallback: LlmProvider,
    request: LlmProviderRequest,
    attempts: number,
  ): Promise<LlmCallResult> {
    try {
      const response = await fallback.generate(request);
      this.logger.log(`Fallback "${fallback.name}" succeeded`);
      return { success: true, response, providerUsed: fallback.name, attempts };
    } catch (fallbackErr) {
      this.logger.error(
        `Fallback "${fallback.name}" also failed: ${String(fallbackErr)}`,
      );
      return {
        success: false,
        error: `All providers failed after ${attempts} attempts`,
        providerUsed: fallback.name,
        attempts,
      };
    }
  }

  classifyError(err: unknown): ErrorCategory {
    const message = String(err).toLowerCase();
    const status =
      err !== null && typeof err === 'object' && 'status' in err && typeof err.status === 'number'
        ? err.status
        : 0;

    // PERMANENT: auth, invalid model, content policy
    if (status === 401 || status === 403) return 'PERMANENT';
    if (message.includes('invalid_model') || message.includes('model_not_found'))
      return 'PERMANENT';
    if (message.includes('content_policy') || message.includes('content_filter'))
      return 'PERMANENT';

    // RETRYABLE: timeout, rate limit, server error, overloaded
    return 'RETRYABLE';
  }
}
