// 서술 생성기 LLM 공급자 계약
// 메시지는 system/user/assistant 공통 형식, 공급자가 generate() 안에서 자기 API 형식으로 바꾼다.

export type LlmRole = 'system' | 'user' | 'assistant';

export interface LlmMessage {
  role: LlmRole;
  content: string;
}

export interface LlmProviderRequest {
  messages: LlmMessage[];
  maxTokens: number;
  temperature: number;
  /** true면 공급자의 JSON 출력 모드를 켠다 (서술 응답 계약) */
  jsonMode: boolean;
  /** 없으면 공급자 설정 모델 */
  model?: string;
}

export interface LlmProviderResponse {
  text: string;
  model: string;
  promptTokens: number;
  completionTokens: number;
  latencyMs: number;
}

export interface LlmProvider {
  readonly name: string;
  generate(request: LlmProviderRequest): Promise<LlmProviderResponse>;
  /** API 키 설정 여부 */
  isAvailable(): boolean;
}

/** PERMANENT면 재시도 없이 fallback으로 */
export type ErrorCategory = 'RETRYABLE' | 'PERMANENT';

export type LlmCallResult =
  | {
      success: true;
      response: LlmProviderResponse;
      providerUsed: string;
      attempts: number;
    }
  | {
      success: false;
      error: string;
      providerUsed: string;
      attempts: number;
    };

export interface LlmConfig {
  provider: string;
  fallbackProvider: string;
  openaiApiKey: string;
  openaiModel: string;
  claudeApiKey: string;
  claudeModel: string;
  geminiApiKey: string;
  geminiModel: string;
  maxRetries: number;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}
