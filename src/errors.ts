import type { Decision, ProviderRole } from './types/index.js';

/**
 * Base error class for every failure the moderation core raises.
 */
export class ModerationError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModerationError';
    this.code = code;
  }
}

/**
 * Thrown when the embedding backend cannot produce a vector.
 */
export class EmbeddingUnavailableError extends ModerationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'EMBEDDING_UNAVAILABLE', options);
    this.name = 'EmbeddingUnavailableError';
  }
}

/**
 * Thrown when a vector does not match the index dimension. Configuration
 * error, never retried.
 */
export class DimensionMismatchError extends ModerationError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Embedding dimension mismatch: index expects ${expected}, got ${actual}`, 'DIMENSION_MISMATCH');
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Raised by a generation or embedding backend for a single failed call.
 */
export class ProviderError extends ModerationError {
  public readonly retryable: boolean;
  public readonly status?: number;

  constructor(message: string, retryable: boolean, status?: number, options?: { cause?: unknown }) {
    super(message, 'PROVIDER_ERROR', options);
    this.name = 'ProviderError';
    this.retryable = retryable;
    this.status = status;
  }
}

export interface ProviderFailure {
  role: ProviderRole;
  provider: string;
  attempts: number;
  reason: string;
}

/**
 * Thrown when both generation providers are exhausted. Content is neither
 * approved nor flagged.
 */
export class DecisionUnavailableError extends ModerationError {
  public readonly failures: ProviderFailure[];

  constructor(failures: ProviderFailure[]) {
    const summary = failures.map(f => `${f.role.toLowerCase()} ${f.provider}: ${f.reason}`).join('; ');
    super(`No generation provider produced a valid decision (${summary})`, 'DECISION_UNAVAILABLE');
    this.name = 'DecisionUnavailableError';
    this.failures = failures;
  }
}

/**
 * Thrown when the audit store rejects a write. The decision itself is
 * valid and travels with the error.
 */
export class AuditWriteFailedError extends ModerationError {
  public readonly decision: Decision;

  constructor(decision: Decision, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Audit record could not be written${detail}`, 'AUDIT_WRITE_FAILED', options);
    this.name = 'AuditWriteFailedError';
    this.decision = decision;
  }
}

/**
 * Thrown when a moderation call is cancelled between stages.
 */
export class ModerationAbortedError extends ModerationError {
  constructor(stage: string) {
    super(`Moderation aborted before ${stage}`, 'MODERATION_ABORTED');
    this.name = 'ModerationAbortedError';
  }
}

export function isModerationError(error: unknown): error is ModerationError {
  return error instanceof ModerationError;
}

/**
 * Thrown at startup when the configuration file does not validate.
 */
export class ConfigError extends ModerationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INVALID_CONFIG', options);
    this.name = 'ConfigError';
  }
}
