/**
 * Provider Types and Configurations
 */

export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'google'] as const;
export type EmbeddingProvider = (typeof EMBEDDING_PROVIDERS)[number];

export const LLM_PROVIDERS = ['openai', 'google', 'anthropic', 'ollama'] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export function isEmbeddingProvider(value: string): value is EmbeddingProvider {
  return EMBEDDING_PROVIDERS.some((provider) => provider === value);
}

export function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

/**
 * Chat Model Options
 */
export interface ChatModelOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}

/**
 * Resolved per-purpose chat settings
 */
export interface ChatPurposeConfig {
  provider: LLMProvider;
  model: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
  fallbackEnabled: boolean;
  fallbackProvider: LLMProvider;
  fallbackModel: string;
}
