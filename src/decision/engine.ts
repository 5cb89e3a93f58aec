import pino, { type Logger } from 'pino';
import { DecisionUnavailableError, ModerationAbortedError, type ProviderFailure } from '../errors.js';
import type { GenerationProvider } from '../inference/router.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../inference/retry.js';
import type { ContentItem, Decision, ProviderRole, RetrievalResult } from '../types/index.js';
import { buildAugmentedPrompt, MODERATION_SYSTEM_PROMPT } from './prompt.js';
import { parseDecisionResponse, type ParsedDecision } from './response.js';

export type DecisionState = 'START' | 'TRY_PRIMARY' | 'TRY_FALLBACK' | 'DONE' | 'FAILED';

export interface DecisionEngineOptions {
  primary: GenerationProvider;
  fallback?: GenerationProvider;
  retry?: RetryPolicy;
  /** Wall-clock ceiling for one decide call, fallback included */
  decideTimeoutMs?: number;
  promptCharBudget?: number;
  maxOutputTokens?: number;
  logger?: Logger;
  onTransition?: (from: DecisionState, to: DecisionState) => void;
}

type AttemptOutcome =
  | { ok: true; value: ParsedDecision }
  | { ok: false; failure: ProviderFailure };

export class DecisionEngine {
  private primary: GenerationProvider;
  private fallback?: GenerationProvider;
  private retry: RetryPolicy;
  private decideTimeoutMs: number;
  private promptCharBudget: number;
  private maxOutputTokens: number;
  private logger: Logger;
  private onTransition?: (from: DecisionState, to: DecisionState) => void;

  constructor(options: DecisionEngineOptions) {
    this.primary = options.primary;
    this.fallback = options.fallback;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.decideTimeoutMs = options.decideTimeoutMs ?? 60000;
    this.promptCharBudget = options.promptCharBudget ?? 8000;
    this.maxOutputTokens = options.maxOutputTokens ?? 512;
    this.logger = options.logger ?? pino({ level: 'silent' });
    this.onTransition = options.onTransition;
  }

  getProviders(): { primary: string; fallback?: string } {
    return { primary: this.primary.name, fallback: this.fallback?.name };
  }

  async decide(content: ContentItem, retrieved: RetrievalResult, signal?: AbortSignal): Promise<Decision> {
    const startTime = Date.now();
    const deadline = startTime + this.decideTimeoutMs;
    const augmented = buildAugmentedPrompt(content.text, retrieved, this.promptCharBudget);

    if (augmented.droppedPolicies > 0) {
      this.logger.warn(
        { kept: augmented.policyIds.length, dropped: augmented.droppedPolicies },
        'Prompt budget exceeded, dropped lowest-ranked policies'
      );
    }

    const chain: Array<{ role: ProviderRole; provider: GenerationProvider }> = [{ role: 'PRIMARY', provider: this.primary }];
    if (this.fallback) chain.push({ role: 'FALLBACK', provider: this.fallback });

    const failures: ProviderFailure[] = [];
    let state: DecisionState = 'START';
    const transition = (to: DecisionState) => {
      this.onTransition?.(state, to);
      state = to;
    };

    transition('TRY_PRIMARY');

    for (const { role, provider } of chain) {
      if (role === 'FALLBACK') {
        this.logger.warn({ provider: provider.name }, 'Primary provider exhausted, engaging fallback');
      }

      const outcome = await this.attempt(role, provider, augmented.prompt, deadline, signal);

      if (outcome.ok) {
        transition('DONE');
        const allowed = new Set(augmented.policyIds);
        const cited = [...new Set(outcome.value.policies_cited)].filter(id => allowed.has(id));
        const dropped = outcome.value.policies_cited.length - cited.length;
        if (dropped > 0) {
          this.logger.warn({ provider: provider.name, dropped }, 'Discarded citations of policies not in the prompt');
        }

        const decision: Decision = Object.freeze({
          verdict: outcome.value.verdict,
          reason: outcome.value.reason,
          policies_cited: Object.freeze(cited),
          provider_used: role,
          latency_ms: Date.now() - startTime
        });

        this.logger.info(
          {
            verdict: decision.verdict,
            provider_used: role,
            latency_ms: decision.latency_ms,
            cited: cited.length
          },
          'Decision produced'
        );
        return decision;
      }

      failures.push(outcome.failure);
      transition(role === 'PRIMARY' && this.fallback ? 'TRY_FALLBACK' : 'FAILED');
    }

    throw new DecisionUnavailableError(failures);
  }

  private async attempt(
    role: ProviderRole,
    provider: GenerationProvider,
    prompt: string,
    deadline: number,
    signal?: AbortSignal
  ): Promise<AttemptOutcome> {
    let attempts = 0;

    try {
      const raw = await withRetry(
        attemptSignal => {
          attempts++;
          return provider.generate({
            prompt,
            systemPrompt: MODERATION_SYSTEM_PROMPT,
            maxTokens: this.maxOutputTokens,
            temperature: 0,
            signal: attemptSignal
          });
        },
        this.retry,
        {
          signal,
          deadline,
          stage: 'decision',
          onAttemptFailed: ({ attempt, error }) => {
            this.logger.warn(
              { provider: provider.name, role, attempt, retryable: error.retryable, status: error.status, err: error.message },
              'Generation attempt failed'
            );
          }
        }
      );

      const parsed = parseDecisionResponse(raw);
      if (!parsed.valid) {
        this.logger.warn({ provider: provider.name, role, issues: parsed.issues }, 'Response failed validation');
        return {
          ok: false,
          failure: { role, provider: provider.name, attempts, reason: `invalid response (${parsed.issues.join(', ')})` }
        };
      }

      return { ok: true, value: parsed.value };
    } catch (error) {
      if (error instanceof ModerationAbortedError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      return { ok: false, failure: { role, provider: provider.name, attempts, reason } };
    }
  }
}
