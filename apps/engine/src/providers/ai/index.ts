export * from './AiProvider';
export { GeminiProvider } from './GeminiProvider';
export { AnthropicProvider } from './AnthropicProvider';
export { OpenAiProvider, toOpenAiProviderError } from './OpenAiProvider';
export { StubProvider } from './StubProvider';
export { createAdapter, createProviderRegistrations } from './factory';
export type { ProviderRegistration } from './factory';
export * from './prompts';
