import logger from './logger.js';

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'ENOTFOUND', 'ECONNREFUSED']);

export type RetryOptions = {
  attempts?: number;
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const readProperty = (value: unknown, key: string): unknown => {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
};

// Google client errors expose the HTTP status either on `response.status` or on a numeric `code`.
export const httpStatusOf = (error: unknown): number | null => {
  const responseStatus = readProperty(readProperty(error, 'response'), 'status');
  if (typeof responseStatus === 'number') {
    return responseStatus;
  }
  const status = readProperty(error, 'status');
  if (typeof status === 'number') {
    return status;
  }
  const code = readProperty(error, 'code');
  if (typeof code === 'number') {
    return code;
  }
  if (typeof code === 'string' && /^\d{3}$/.test(code)) {
    return Number.parseInt(code, 10);
  }
  return null;
};

export const isRetryableGoogleError = (error: unknown): boolean => {
  const status = httpStatusOf(error);
  if (status !== null) {
    return status === 429 || status >= 500;
  }
  const code = readProperty(error, 'code');
  return typeof code === 'string' && RETRYABLE_CODES.has(code);
};

export async function withGoogleRetry<T>(
  operation: string,
  call: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const attempts = options.attempts ?? 3;
  const backoffMs = options.backoffMs ?? 500;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await call();
    } catch (error) {
      if (attempt >= attempts || !isRetryableGoogleError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.warn(`[google] ${operation} failed (attempt ${attempt}/${attempts}), retrying: ${message}`);
      await sleep(backoffMs * attempt);
    }
  }
}
