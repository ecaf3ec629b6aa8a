/**
 * Provider Types and Configurations
 */

export type EmbeddingProvider = 'ollama' | 'openai' | 'google';

export const LLM_PROVIDERS = [
  'openrouter',
  'openai',
  'google',
  'anthropic',
  'ollama',
] as const;

export type LLMProvider = (typeof LLM_PROVIDERS)[number];

/**
 * Chat Model Options
 */
export interface ChatModelOptions {
  temperature: number;
  maxTokens: number;
}
