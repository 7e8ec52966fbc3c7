// Claude LLM 공급자 — @anthropic-ai/sdk
//
// 변환 로직:
// - OpenAI의 system 메시지 -> Anthropic API의 top-level system 파라미터로 분리
// - messages에서 system role 제거, user/assistant만 전달
// - response: text 블록 연결, usage.input_tokens, usage.output_tokens
// - jsonMode: assistant prefill '{'

import Anthropic from '@anthropic-ai/sdk';
import type {
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';
import type { LlmConfigService } from '../llm-config.service.js';

export class ClaudeProvider implements LlmProvider {
  readonly name = 'claude';
  private client: Anthropic | null = null;

  constructor(private readonly configService: LlmConfigService) {}

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({
        apiKey: this.configService.get().claudeApiKey,
      });
    }
    return this.client;
  }

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const start = Date.now();
    const config = this.configService.get();
    const model = request.model ?? config.claudeModel;

    const system = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const messages: Anthropic.MessageParam[] = [];
    for (const m of request.messages) {
      if (m.role === 'user' || m.role === 'assistant') {
        messages.push({ role: m.role, content: m.content });
      }
    }
    // JSON 모드: assistant 턴을 '{'로 시작시키고 응답 앞에 다시 붙인다
    const prefill = request.jsonMode ? '{' : '';
    if (prefill) messages.push({ role: 'assistant', content: prefill });

    const response = await this.getClient().messages.create({
      model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      ...(system ? { system } : {}),
      messages,
    }, { timeout: config.timeoutMs });

    const text = prefill + response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    return {
      text,
      model: response.model,
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return !!this.configService.get().claudeApiKey;
  }
}
