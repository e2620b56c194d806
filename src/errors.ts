/**
 * Failure kinds the relay distinguishes. Each kind has its own recovery:
 * - connectivity: node unreachable or timed out; back off and retry
 * - malformed-data: record dropped, processing continues
 * - replay: nonce already consumed; record dropped
 * - submission: destination call failed; logged, optionally redelivered
 * - initialization: relay cannot start
 */
export type RelayErrorKind =
  | 'connectivity'
  | 'malformed-data'
  | 'replay'
  | 'submission'
  | 'initialization'
  | 'unknown';

export class RelayError extends Error {
  constructor(
    public readonly kind: RelayErrorKind,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const CONNECTIVITY_CODES = new Set([
  'NETWORK_ERROR',
  'SERVER_ERROR',
  'TIMEOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN'
]);

const MALFORMED_DATA_CODES = new Set([
  'INVALID_ARGUMENT',
  'MISSING_ARGUMENT',
  'UNEXPECTED_ARGUMENT',
  'NUMERIC_FAULT'
]);

/** Broadcast errors worth another attempt */
const RETRYABLE_SUBMISSION_MESSAGES = [/rate limit/, /\b429\b/];

/** A node's answer to a transaction it already holds or has mined */
const ALREADY_BROADCAST_MESSAGES = ['already known', 'nonce too low', 'nonce has already been used'];

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error code carried by ethers errors and Node system errors.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function classifyError(error: unknown): RelayErrorKind {
  if (error instanceof RelayError) {
    return error.kind;
  }

  const code = errorCode(error);
  if (code !== undefined) {
    if (CONNECTIVITY_CODES.has(code)) return 'connectivity';
    if (MALFORMED_DATA_CODES.has(code)) return 'malformed-data';
  }

  return 'unknown';
}

export function isRetryableSubmissionError(error: unknown): boolean {
  const code = errorCode(error);
  if (code === 'CALL_EXCEPTION' || (code !== undefined && MALFORMED_DATA_CODES.has(code))) {
    return false;
  }
  if (code !== undefined && CONNECTIVITY_CODES.has(code)) {
    return true;
  }

  const message = describeError(error).toLowerCase();
  return RETRYABLE_SUBMISSION_MESSAGES.some(pattern => pattern.test(message));
}

/**
 * True when re-sending a signed transaction failed because the node already
 * has it; only meaningful after an earlier send of the same bytes.
 */
export function isAlreadyBroadcastError(error: unknown): boolean {
  if (errorCode(error) === 'NONCE_EXPIRED') {
    return true;
  }
  const message = describeError(error).toLowerCase();
  return ALREADY_BROADCAST_MESSAGES.some(pattern => message.includes(pattern));
}
