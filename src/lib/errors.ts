/**
 * NewsRelay — Errors
 *
 * Error classes for the failures a cycle distinguishes between.
 * Source and embedding failures are absorbed where they happen; these
 * types cover what has to reach the cycle report.
 */

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'PERSISTENCE_FAILED'
  | 'EMBEDDING_FAILED'
  | 'DELIVERY_FAILED';

export class NewsRelayError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NewsRelayError';
  }
}

export class ConfigError extends NewsRelayError {
  constructor(public readonly issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class PersistenceError extends NewsRelayError {
  constructor(public readonly key: string, cause: unknown) {
    super('PERSISTENCE_FAILED', `State "${key}" unavailable: ${describeCause(cause)}`, { cause });
    this.name = 'PersistenceError';
  }
}

export class EmbeddingError extends NewsRelayError {
  constructor(message: string, cause?: unknown) {
    super('EMBEDDING_FAILED', message, { cause });
    this.name = 'EmbeddingError';
  }
}

export class DeliveryError extends NewsRelayError {
  constructor(public readonly status: number, description: string) {
    super('DELIVERY_FAILED', `Telegram API error ${status}: ${description}`);
    this.name = 'DeliveryError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
