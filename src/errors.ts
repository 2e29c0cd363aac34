import type { FailureKind, SessionStatus, StageFailure, StageKind } from './types/index.js';
import { LLMError } from './clients/llm.js';
import { PerplexityError } from './services/perplexity.js';

export class StageFailureError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public readonly stage?: StageKind,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'StageFailureError';
  }

  toFailure(): StageFailure {
    return { kind: this.kind, detail: this.message };
  }
}

export class SessionValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionValidationError';
  }
}

export class SessionCancelledError extends Error {
  constructor(public readonly sessionId: string) {
    super('Cancelled');
    this.name = 'SessionCancelledError';
  }
}

export class StateInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateInvariantError';
  }
}

export class IllegalTransitionError extends StateInvariantError {
  constructor(
    public readonly sessionId: string,
    public readonly from: SessionStatus,
    public readonly to: SessionStatus
  ) {
    super(`Session ${sessionId}: illegal status transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
]);

function systemCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Decide whether an error is worth retrying. Only structured signals count:
 * the error class, an HTTP status, or a socket error code (also on `cause`,
 * where fetch puts it).
 */
export function classifyError(error: unknown): FailureKind {
  if (error instanceof StageFailureError) return error.kind;
  if (error instanceof SessionCancelledError) return 'cancelled';
  if (error instanceof LLMError) return error.transient ? 'transient' : 'permanent';
  if (error instanceof PerplexityError) return error.transient ? 'transient' : 'permanent';
  if (error instanceof SessionValidationError) return 'permanent';
  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') return 'transient';
    const code = systemCode(error) ?? systemCode(error.cause);
    if (code !== undefined && TRANSIENT_CODES.has(code)) return 'transient';
  }
  return 'permanent';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toStageFailure(error: unknown): StageFailure {
  if (error instanceof StageFailureError) return error.toFailure();
  return { kind: classifyError(error), detail: errorMessage(error) };
}
