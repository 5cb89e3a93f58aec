import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { ProviderError } from '../errors.js';

export interface GenerationBackend {
  name: string;
  type: 'anthropic' | 'ollama';
  model: string;
  baseUrl?: string;
  apiKey?: string;
}

export interface GenerationRequest {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface GenerationProvider {
  readonly name: string;
  readonly model: string;
  /** Returns the raw model text; structure is validated by the caller */
  generate(request: GenerationRequest): Promise<string>;
}

const DEFAULT_SYSTEM_PROMPT = 'You are a compliance moderation assistant. Respond only with the JSON object requested.';

/**
 * Retry on 408/409/429 and 5xx; everything else is treated as a problem
 * with the request itself.
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

export function classifyAnthropicError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  if (error instanceof Anthropic.APIConnectionError) {
    return new ProviderError(`Anthropic connection failed: ${error.message}`, true, undefined, { cause: error });
  }

  if (error instanceof Anthropic.APIError) {
    const status = error.status;
    const retryable = status !== undefined && isTransientStatus(status);
    return new ProviderError(`Anthropic API error: ${status ?? 'unknown'} - ${error.message}`, retryable, status, {
      cause: error
    });
  }

  if (error instanceof Error) {
    return new ProviderError(error.message, false, undefined, { cause: error });
  }
  return new ProviderError(String(error), false);
}

export class AnthropicGenerationProvider implements GenerationProvider {
  readonly name: string;
  readonly model: string;

  private client?: Anthropic;
  private apiKey?: string;

  constructor(backend: GenerationBackend) {
    this.name = backend.name;
    this.model = backend.model;
    this.apiKey = backend.apiKey;
  }

  private getClient(): Anthropic {
    if (!this.client) {
      try {
        // Retries are handled by the decision engine, not the SDK
        this.client = new Anthropic({ apiKey: this.apiKey, maxRetries: 0 });
      } catch (error) {
        throw classifyAnthropicError(error);
      }
    }
    return this.client;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const client = this.getClient();

    try {
      const response = await client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens || 512,
          temperature: request.temperature ?? 0,
          system: request.systemPrompt || DEFAULT_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: request.prompt }]
        },
        { signal: request.signal }
      );

      const parts: string[] = [];
      for (const block of response.content) {
        if (block.type === 'text') parts.push(block.text);
      }
      return parts.join('\n');
    } catch (error) {
      throw classifyAnthropicError(error);
    }
  }
}

const ollamaGenerateSchema = z.object({ response: z.string() });

export class OllamaGenerationProvider implements GenerationProvider {
  readonly name: string;
  readonly model: string;

  private baseUrl: string;

  constructor(backend: GenerationBackend) {
    this.name = backend.name;
    this.model = backend.model;
    this.baseUrl = backend.baseUrl || 'http://localhost:11434';
  }

  async generate(request: GenerationRequest): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          prompt: request.prompt,
          system: request.systemPrompt || DEFAULT_SYSTEM_PROMPT,
          stream: false,
          format: 'json',
          options: {
            temperature: request.temperature ?? 0,
            num_predict: request.maxTokens || 512
          }
        }),
        signal: request.signal
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Ollama unreachable: ${message}`, true, undefined, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new ProviderError(`Ollama error: ${response.status} ${body}`.trim(), isTransientStatus(response.status), response.status);
    }

    const parsed = ollamaGenerateSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError('Ollama returned an unexpected body', false);
    }
    return parsed.data.response;
  }
}

export function createGenerationProvider(backend: GenerationBackend): GenerationProvider {
  switch (backend.type) {
    case 'anthropic':
      return new AnthropicGenerationProvider(backend);

    case 'ollama':
      return new OllamaGenerationProvider(backend);
  }
}
