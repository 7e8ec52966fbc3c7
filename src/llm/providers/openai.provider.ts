// OpenAI LLM 공급자 — openai SDK, Chat Completions API

import OpenAI from 'openai';
import type {
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';
import type { LlmConfigService } from '../llm-config.service.js';

export class OpenAIProvider implements LlmProvider {
  readonly name = 'openai';
  private client: OpenAI | null = null;

  constructor(private readonly configService: LlmConfigService) {}

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.configService.get().openaiApiKey,
      });
    }
    return this.client;
  }

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const start = Date.now();
    const config = this.configService.get();
    const model = request.model ?? config.openaiModel;

    const completion = await this.getClient().chat.completions.create({
      model,
      messages: request.messages.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      ...(request.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
    }, { timeout: config.timeoutMs });

    const choice = completion.choices[0];
    const text = choice?.message?.content ?? '';

    return {
      text,
      model: completion.model,
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return !!this.configService.get().openaiApiKey;
  }
}
