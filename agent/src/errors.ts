/**
 * Error taxonomy for the decision cycle. Every failure the agent reasons about
 * carries a `kind` so callers can branch without string matching.
 */

export type AgentErrorKind =
  | "transient_network"
  | "ai_unavailable"
  | "malformed_response"
  | "validation_rejected"
  | "exchange"
  | "precision_lookup_failed"
  | "configuration";

export abstract class AgentError extends Error {
  abstract readonly kind: AgentErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Retryable failure talking to the model endpoint. */
export class TransientNetworkError extends AgentError {
  readonly kind = "transient_network";
}

export class AIUnavailable extends AgentError {
  readonly kind = "ai_unavailable";

  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class MalformedResponse extends AgentError {
  readonly kind = "malformed_response";

  /** Reasoning trace recovered before parsing failed. */
  constructor(
    message: string,
    readonly reasoning: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ValidationRejected extends AgentError {
  readonly kind = "validation_rejected";

  constructor(
    message: string,
    readonly symbol: string,
  ) {
    super(message);
  }
}

export type ExchangeName = "binance" | "hyperliquid" | "aster";

export class ExchangeError extends AgentError {
  readonly kind = "exchange";

  constructor(
    message: string,
    readonly exchange: ExchangeName,
    readonly details: { status?: number; code?: number } = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class PrecisionLookupFailed extends AgentError {
  readonly kind = "precision_lookup_failed";
}

export class ConfigurationError extends AgentError {
  readonly kind = "configuration";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
