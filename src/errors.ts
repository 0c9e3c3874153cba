export class TransientApiError extends Error {
  public readonly operation: string;
  public readonly attempts: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    super(`${operation} failed after ${attempts} attempt(s): ${describeError(cause)}`, { cause });
    this.name = 'TransientApiError';
    this.operation = operation;
    this.attempts = attempts;
  }
}

export class SupersededError extends Error {
  public readonly expectedSha: string;
  public readonly currentSha: string;

  constructor(expectedSha: string, currentSha: string) {
    super(`Head moved from ${expectedSha.slice(0, 7)} to ${currentSha.slice(0, 7)}`);
    this.name = 'SupersededError';
    this.expectedSha = expectedSha;
    this.currentSha = currentSha;
  }
}

const TRANSIENT_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
]);

export function errorStatus(error: unknown): number | null {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

function errorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return errorCode(error.cause);
  }
  return null;
}

export function isTransientError(error: unknown): boolean {
  const status = errorStatus(error);
  if (status !== null) {
    if (TRANSIENT_STATUS_CODES.has(status)) return true;
    return status === 403 && error instanceof Error && /rate limit/i.test(error.message);
  }

  const code = errorCode(error);
  if (code !== null && TRANSIENT_NETWORK_CODES.has(code)) return true;

  return error instanceof TypeError && /fetch failed/i.test(error.message);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
