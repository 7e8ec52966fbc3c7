import { Logger, Module, type OnModuleInit } from '@nestjs/common';
import { LlmConfigService } from './llm-config.service.js';
import { PromptBuilderService } from './prompts/prompt-builder.service.js';
import { LlmCallerService } from './llm-caller.service.js';
import { NarrativeResponseParser } from './narrative-response.parser.js';
import { NarrativeGeneratorService } from './narrative-generator.service.js';
import {
  ClaudeProvider,
  GeminiProvider,
  LlmProviderRegistryService,
  MockProvider,
  OpenAIProvider,
} from './providers/index.js';

@Module({
  providers: [
    LlmConfigService,
    PromptBuilderService,
    LlmCallerService,
    LlmProviderRegistryService,
    NarrativeResponseParser,
    NarrativeGeneratorService,
  ],
  exports: [LlmConfigService, NarrativeGeneratorService],
})
export class LlmModule implements OnModuleInit {
  private readonly logger = new Logger(LlmModule.name);

  constructor(
    private readonly registry: LlmProviderRegistryService,
    private readonly configService: LlmConfigService,
  ) {}

  onModuleInit(): void {
    const config = this.configService.get();

    this.registry.register(new MockProvider());
    this.registry.register(new OpenAIProvider(this.configService));
    this.registry.register(new ClaudeProvider(this.configService));
    this.registry.register(new GeminiProvider(this.configService));

    this.logger.log(
      `Narrative provider=${config.provider}, fallback=${config.fallbackProvider}, keys set for [${this.configService.availableProviders().join(', ')}]`,
    );
  }
}
