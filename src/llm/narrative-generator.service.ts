// 서술 생성기 — 액션당 LLM 1회 호출, 판정 결과는 호출 전에 확정되어 입력으로 들어간다

import { Injectable, Logger } from '@nestjs/common';
import { PromptBuilderService } from './prompts/prompt-builder.service.js';
import { LlmCallerService } from './llm-caller.service.js';
import { LlmConfigService } from './llm-config.service.js';
import { NarrativeResponseParser } from './narrative-response.parser.js';
import { NarrativeUnavailableError } from '../common/errors/game-errors.js';
import type {
  NarrativeGenerator,
  NarrativeRequest,
  NarrativeResponse,
} from './types/index.js';

@Injectable()
export class NarrativeGeneratorService implements NarrativeGenerator {
  private readonly logger = new Logger(NarrativeGeneratorService.name);

  constructor(
    private readonly promptBuilder: PromptBuilderService,
    private readonly llmCaller: LlmCallerService,
    private readonly configService: LlmConfigService,
    private readonly parser: NarrativeResponseParser,
  ) {}

  async generate(request: NarrativeRequest): Promise<NarrativeResponse> {
    const config = this.configService.get();
    const messages = this.promptBuilder.buildNarrativePrompt(request);

    const result = await this.llmCaller.call({
      messages,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      jsonMode: true,
    });

    if (!result.success) {
      throw new NarrativeUnavailableError(result.error, {
        providerUsed: result.providerUsed,
        attempts: result.attempts,
      });
    }

    const { response } = result;
    this.logger.log(
      `Narrative via ${result.providerUsed}/${response.model}: ${response.promptTokens}+${response.completionTokens} tokens, ${response.latencyMs}ms`,
    );
    return this.parser.parse(response.text);
  }
}
