import { logger } from './logger';

/**
 * Retry helper for network operations with exponential backoff.
 * `shouldRetry` decides whether a failure is worth another attempt;
 * a refused failure is rethrown at once.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 1000,
  operationName: string = 'operation',
  shouldRetry: (error: unknown) => boolean = () => true,
): Promise<T> {
  let lastError: unknown;

  for (let i = 0; i <= maxRetries; i++) {
    try {
      return await operation(i);
    } catch (error) {
      lastError = error;
      if (i === maxRetries || !shouldRetry(error)) {
        break;
      }
      const delay = baseDelay * Math.pow(2, i);
      const retryCount = i + 1;
      logger.warn(
        `${operationName} failed, retrying in ${delay}ms (retry ${retryCount}/${maxRetries})`,
        {
          error: errorMessage(lastError),
        },
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  logger.debug(`${operationName} gave up`, {
    error: errorMessage(lastError),
  });
  throw lastError;
}

/**
 * Execute operation with fallback.
 * The fallback only runs for failures `shouldFallback` accepts.
 */
export async function withFallback<T>(
  primary: () => Promise<T>,
  fallback: () => Promise<T>,
  operationName: string = 'operation',
  shouldFallback: (error: unknown) => boolean = () => true,
): Promise<T> {
  try {
    return await primary();
  } catch (error) {
    if (!shouldFallback(error)) {
      throw error;
    }
    logger.warn(`${operationName} primary failed, using fallback`, {
      error: errorMessage(error),
    });
    return await fallback();
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
