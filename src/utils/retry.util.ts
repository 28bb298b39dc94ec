import { logger } from '../config/logger';
import { ExternalServiceUnavailableError, errorMessage } from '../errors/interview-errors';
import { TimeoutError } from './timeout.util';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T>;
}

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT']);
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503]);

/**
 * Retry Utility
 *
 * Retry logic with exponential backoff for calls to external services.
 * Used around transcription, text analysis and audio feature extraction.
 */
export class RetryUtil {
    /**
     * Execute function with retry logic
     */
    static async executeWithRetry<T>(
        operation: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation'
        } = options;

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error) {
                lastError = error;

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: errorMessage(error),
                    isRetryable: this.isRetryableError(error)
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts) {
                    break;
                }

                if (!this.isRetryableError(error)) {
                    logger.error({
                        operation: operationName,
                        error: errorMessage(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await this.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: lastError === null ? undefined : errorMessage(lastError)
        }, `${operationName} failed after ${maxAttempts} attempts`);

        throw lastError ?? new Error(`${operationName} failed after ${maxAttempts} attempts`);
    }

    /**
     * Check if error is retryable
     */
    private static isRetryableError(error: unknown): boolean {
        if (error instanceof ExternalServiceUnavailableError || error instanceof TimeoutError) {
            return true;
        }

        if (typeof error !== 'object' || error === null) {
            return false;
        }

        // Network errors
        if ('code' in error && typeof error.code === 'string' && RETRYABLE_CODES.has(error.code)) {
            return true;
        }

        // Provider rate limits and server errors
        if ('status' in error && typeof error.status === 'number' && RETRYABLE_STATUSES.has(error.status)) {
            return true;
        }

        const message = error instanceof Error ? error.message.toLowerCase() : '';
        return ['timeout', 'rate limit', 'quota', 'connection', 'network'].some(hint => message.includes(hint));
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
