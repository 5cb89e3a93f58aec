import { z } from 'zod';
import { EmbeddingUnavailableError, ModerationAbortedError, ProviderError } from '../errors.js';
import { isTransientStatus } from '../inference/router.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../inference/retry.js';

export interface EmbeddingBackend {
  type: 'openai' | 'ollama';
  model: string;
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  retries?: number;
}

export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

const openAIEmbeddingSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number() })).min(1),
  model: z.string()
});

const ollamaEmbeddingSchema = z.object({
  embedding: z.array(z.number())
});

async function postJson(url: string, body: unknown, headers: Record<string, string>, signal: AbortSignal): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ProviderError(`Embedding backend unreachable: ${message}`, true, undefined, { cause: error });
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => '');
    throw new ProviderError(
      `Embedding backend error: ${response.status} ${errorText}`.trim(),
      isTransientStatus(response.status),
      response.status
    );
  }

  return response.json();
}

function assertUsableVector(vector: number[]): number[] {
  if (vector.length === 0 || vector.some(v => !Number.isFinite(v))) {
    throw new ProviderError('Embedding backend returned an empty or non-finite vector', false);
  }
  return vector;
}

/**
 * Shared retry and error mapping; subclasses implement a single request.
 */
abstract class HttpEmbeddingProvider implements EmbeddingProvider {
  abstract readonly name: string;
  protected readonly policy: RetryPolicy;

  constructor(backend: EmbeddingBackend) {
    this.policy = {
      retries: backend.retries ?? DEFAULT_RETRY_POLICY.retries,
      attemptTimeoutMs: backend.timeoutMs ?? 10000,
      delayMs: DEFAULT_RETRY_POLICY.delayMs
    };
  }

  protected abstract request(text: string, signal: AbortSignal): Promise<number[]>;

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    try {
      const vector = await withRetry(attemptSignal => this.request(text, attemptSignal), this.policy, {
        signal,
        stage: 'embedding'
      });
      return assertUsableVector(vector);
    } catch (error) {
      if (error instanceof ModerationAbortedError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new EmbeddingUnavailableError(`${this.name}: ${message}`, { cause: error });
    }
  }
}

export class OpenAIEmbeddingProvider extends HttpEmbeddingProvider {
  readonly name = 'openai-embeddings';

  private apiKey: string | undefined;
  private endpoint: string;
  private model: string;

  constructor(backend: EmbeddingBackend) {
    super(backend);
    this.apiKey = backend.apiKey || process.env.OPENAI_API_KEY;
    this.endpoint = `${backend.baseUrl || 'https://api.openai.com'}/v1/embeddings`;
    this.model = backend.model;
  }

  protected async request(text: string, signal: AbortSignal): Promise<number[]> {
    if (!this.apiKey) {
      throw new ProviderError('OpenAI API key not configured', false);
    }

    const body = await postJson(
      this.endpoint,
      { model: this.model, input: text },
      { Authorization: `Bearer ${this.apiKey}` },
      signal
    );

    const parsed = openAIEmbeddingSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('OpenAI returned an unexpected embedding body', false);
    }
    return parsed.data.data[0].embedding;
  }
}

export class OllamaEmbeddingProvider extends HttpEmbeddingProvider {
  readonly name = 'ollama-embeddings';

  private baseUrl: string;
  private model: string;

  constructor(backend: EmbeddingBackend) {
    super(backend);
    this.baseUrl = backend.baseUrl || 'http://localhost:11434';
    this.model = backend.model;
  }

  protected async request(text: string, signal: AbortSignal): Promise<number[]> {
    const body = await postJson(`${this.baseUrl}/api/embeddings`, { model: this.model, prompt: text }, {}, signal);

    const parsed = ollamaEmbeddingSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('Ollama returned an unexpected embedding body', false);
    }
    return parsed.data.embedding;
  }
}

export function createEmbeddingProvider(backend: EmbeddingBackend): EmbeddingProvider {
  switch (backend.type) {
    case 'openai':
      return new OpenAIEmbeddingProvider(backend);

    case 'ollama':
      return new OllamaEmbeddingProvider(backend);
  }
}
