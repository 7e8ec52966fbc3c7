// Mock LLM 공급자 — 외부 호출 없이 구조화 응답 형식을 흉내낸다

import type {
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';

export class MockProvider implements LlmProvider {
  readonly name = 'mock';

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const start = Date.now();

    // 마지막 user 메시지의 [플레이어 행동] 이후 텍스트를 서술로 사용
    const lastUserMsg = [...request.messages]
      .reverse()
      .find((m) => m.role === 'user');
    const content = lastUserMsg?.content ?? '';
    const marker = content.lastIndexOf('[플레이어 행동]');
    const action = marker >= 0
      ? content.slice(marker + '[플레이어 행동]'.length).trim().split('\n')[0]
      : '';

    const text = JSON.stringify({
      narrative: action ? `당신은 "${action}"을(를) 시도합니다.` : 'No narrative available.',
      options: [],
      state_changes: {},
      dice_applied: false,
    });

    return {
      text,
      model: 'mock-v1',
      promptTokens: 0,
      completionTokens: 0,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return true;
  }
}
