/**
 * Ollama model configuration loaded from environment variables.
 * Models run locally via Ollama.
 */

export const OllamaModels = {
  /** Small instruction model used to name founders from search snippets */
  FOUNDERS: process.env.OLLAMA_MODEL_FOUNDERS ?? 'gemma3:4b',
} as const;

export type OllamaModelType = keyof typeof OllamaModels;

export const OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434';

export interface ModelConfig {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  timeout?: number;
}

export const defaultModelConfigs: Record<OllamaModelType, ModelConfig> = {
  FOUNDERS: {
    model: OllamaModels.FOUNDERS,
    temperature: 0.1,
    maxTokens: 256,
    timeout: 120000, // 2 minutes; small model, short answer
  },
};
