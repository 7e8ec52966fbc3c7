export { MockProvider } from './mock.provider.js';
export { OpenAIProvider } from './openai.provider.js';
export { ClaudeProvider } from './claude.provider.js';
export { GeminiProvider } from './gemini.provider.js';
export { LlmProviderRegistryService } from './llm-provider-registry.service.js';
