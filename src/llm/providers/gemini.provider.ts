// Gemini LLM 공급자 — @google/genai SDK
//
// 변환 로직:
// - OpenAI의 role: assistant -> Gemini의 role: model
// - system 메시지는 systemInstruction으로 분리

import { GoogleGenAI } from '@google/genai';
import type {
  LlmMessage,
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';
import type { LlmConfigService } from '../llm-config.service.js';

export class GeminiProvider implements LlmProvider {
  readonly name = 'gemini';
  private client: GoogleGenAI | null = null;

  constructor(private readonly configService: LlmConfigService) {}

  private getClient(): GoogleGenAI {
    if (!this.client) {
      this.client = new GoogleGenAI({ apiKey: this.configService.get().geminiApiKey });
    }
    return this.client;
  }

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const start = Date.now();
    const config = this.configService.get();
    const model = request.model ?? config.geminiModel;

    const systemMessages = request.messages.filter((m) => m.role === 'system');
    const nonSystemMessages = request.messages.filter((m) => m.role !== 'system');

    const contents = nonSystemMessages.map((m: LlmMessage) => ({
      role: m.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: m.content }],
    }));

    const systemInstruction = systemMessages.length > 0
      ? systemMessages.map((m) => m.content).join('\n\n')
      : undefined;

    const response = await this.getClient().models.generateContent({
      model,
      contents,
      config: {
        maxOutputTokens: request.maxTokens,
        temperature: request.temperature,
        ...(request.jsonMode ? { responseMimeType: 'application/json' } : {}),
        httpOptions: { timeout: config.timeoutMs },
        ...(systemInstruction ? { systemInstruction } : {}),
      },
    });

    const usage = response.usageMetadata;

    return {
      text: response.text ?? '',
      model,
      promptTokens: usage?.promptTokenCount ?? 0,
      completionTokens: usage?.candidatesTokenCount ?? 0,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return !!this.configService.get().geminiApiKey;
  }
}
