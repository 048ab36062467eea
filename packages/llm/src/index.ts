/**
 * @founder-finder/llm - Ollama client wrapper for local LLM inference
 */

export {
  OllamaModels,
  OLLAMA_BASE_URL,
  type OllamaModelType,
  type ModelConfig,
  defaultModelConfigs,
} from './models.js';

export {
  OllamaClient,
  OllamaGenerateResponseSchema,
  complete,
  type CompleteOptions,
  type OllamaGenerateRequest,
  type OllamaGenerateResponse,
} from './client.js';

export {
  buildPrompt,
  createPromptTemplate,
  executeTemplate,
  type PromptTemplate,
} from './prompts.js';
