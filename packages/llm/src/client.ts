/**
 * Ollama HTTP client for local LLM inference.
 * Non-streaming completions only.
 */

import { z } from 'zod';
import {
  OLLAMA_BASE_URL,
  type ModelConfig,
  defaultModelConfigs,
  type OllamaModelType,
} from './models.js';

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  system?: string;
  stream?: boolean;
  format?: 'json';
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
    stop?: string[];
  };
}

export const OllamaGenerateResponseSchema = z
  .object({
    model: z.string(),
    created_at: z.string(),
    response: z.string(),
    done: z.boolean(),
    total_duration: z.number().optional(),
    load_duration: z.number().optional(),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
  })
  .passthrough();

export type OllamaGenerateResponse = z.infer<typeof OllamaGenerateResponseSchema>;

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()).optional(),
});

export class OllamaClient {
  private baseUrl: string;
  private defaultTimeout: number;

  constructor(baseUrl: string = OLLAMA_BASE_URL, defaultTimeout: number = 120000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Generate completion using the /api/generate endpoint.
   */
  async generate(
    request: OllamaGenerateRequest,
    timeout?: number,
  ): Promise<OllamaGenerateResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout ?? this.defaultTimeout);

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...request, stream: false }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Ollama generate failed: ${response.status} - ${error}`);
      }

      const parsed = OllamaGenerateResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
          .join('; ');
        throw new Error(`Ollama generate returned an unexpected payload: ${issues}`);
      }
      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Check if Ollama is running and a model is available.
   */
  async isAvailable(model?: string): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      if (!response.ok) return false;

      if (model) {
        const data = OllamaTagsSchema.safeParse(await response.json());
        if (!data.success) return false;
        return (data.data.models ?? []).some((m) => m.name === model || m.name.startsWith(model));
      }

      return true;
    } catch {
      return false;
    }
  }
}

export type CompleteOptions = Partial<ModelConfig> & {
  system?: string;
  client?: OllamaClient;
};

/**
 * High-level completion function with model type selection.
 * Returns the raw `response` text of the model.
 */
export async function complete(
  prompt: string,
  modelType: OllamaModelType = 'FOUNDERS',
  options?: CompleteOptions,
): Promise<string> {
  const client = options?.client ?? new OllamaClient();
  const config: ModelConfig = { ...defaultModelConfigs[modelType] };
  if (options?.model) config.model = options.model;
  if (options?.temperature !== undefined) config.temperature = options.temperature;
  if (options?.topP !== undefined) config.topP = options.topP;
  if (options?.maxTokens !== undefined) config.maxTokens = options.maxTokens;
  if (options?.timeout !== undefined) config.timeout = options.timeout;

  const response = await client.generate(
    {
      model: config.model,
      prompt,
      system: options?.system,
      options: {
        temperature: config.temperature,
        top_p: config.topP,
        num_predict: config.maxTokens,
      },
    },
    config.timeout,
  );

  return response.response;
}
