export * from './llm-provider.types.js';
export * from './narrative.types.js';
