const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'timeout',
  'timed out',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];

function field(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null || !(key in source)) return undefined;
  return Reflect.get(source, key);
}

function readHeader(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  if (typeof headers !== 'object' || headers === null) return null;
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? field(headers, key) : undefined;
  return typeof value === 'string' ? value : null;
}

function getStatusCode(error: unknown): number | null {
  const status = field(error, 'status');
  if (typeof status === 'number') return status;
  const statusCode = field(error, 'statusCode');
  if (typeof statusCode === 'number') return statusCode;
  const responseStatus = field(field(error, 'response'), 'status');
  return typeof responseStatus === 'number' ? responseStatus : null;
}

function getErrorCode(error: unknown): string | null {
  const code = field(error, 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

export function isTransientError(error: Error, rawError?: unknown): boolean {
  const candidate = rawError ?? error;
  const status = getStatusCode(candidate);
  if (status != null && TRANSIENT_STATUSES.has(status)) return true;

  const code = getErrorCode(candidate);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = error.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Status text embedded in message ("API error 429: ...")
  return /\b(408|425|429|500|502|503|504|529)\b/.test(msg);
}

/**
 * Retry-After from provider error headers, in milliseconds (0 when absent).
 */
function getRetryAfterMs(error: unknown, maxDelayMs: number): number {
  const retryAfter = readHeader(field(error, 'headers'), 'retry-after')
    ?? readHeader(field(field(error, 'response'), 'headers'), 'retry-after');
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    return Math.min(seconds * 1000, maxDelayMs);
  }
  return 0;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  maxDelay?: number;
  onRetry?: (attempt: number, error: Error) => void;
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;
  const maxDelay = options?.maxDelay ?? 60_000;

  let lastError: Error = new Error('withRetry: no attempts made');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !isTransientError(lastError, err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const retryAfterMs = getRetryAfterMs(err, maxDelay);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : Math.min(baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random()), maxDelay);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
