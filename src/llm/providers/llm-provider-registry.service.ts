// LLM 공급자 레지스트리 — Strategy 패턴으로 공급자 관리

import { Injectable, Logger } from '@nestjs/common';
import type { LlmProvider } from '../types/index.js';
import { LlmConfigService } from '../llm-config.service.js';
import { InternalError } from '../../common/errors/game-errors.js';

@Injectable()
export class LlmProviderRegistryService {
  private readonly logger = new Logger(LlmProviderRegistryService.name);
  private readonly providers = new Map<string, LlmProvider>();

  constructor(private readonly configService: LlmConfigService) {}

  register(provider: LlmProvider): void {
    this.providers.set(provider.name, provider);
    this.logger.log(
      `Registered LLM provider: ${provider.name} (available: ${provider.isAvailable()})`,
    );
  }

  getPrimary(): LlmProvider {
    return this.require(this.configService.get().provider, 'Primary');
  }

  getFallback(): LlmProvider {
    return this.require(this.configService.get().fallbackProvider, 'Fallback');
  }

  private require(name: string, role: 'Primary' | 'Fallback'): LlmProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new InternalError(`${role} LLM provider "${name}" not registered`, {
        registered: [...this.providers.keys()],
      });
    }
    return provider;
  }
}
