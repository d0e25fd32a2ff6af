// src/core/healing/RetryHelper.ts

import { ConfigurationManager } from '../configuration/ConfigurationManager';
import { ActionLogger } from '../logging/ActionLogger';
import { AutomationError, errorMessage } from '../errors/AutomationErrors';
import { sleep } from '../utils/WaitUtils';

export interface RetryOptions {
    attempts: number;
    delayMs: number;
}

function resolveRetryOptions(options: Partial<RetryOptions>): RetryOptions {
    const attempts = options.attempts ?? ConfigurationManager.getNumber('RETRY_ATTEMPTS', 3);
    const delayMs = options.delayMs ?? ConfigurationManager.getNumber('RETRY_DELAY', 500);

    if (!Number.isFinite(attempts) || !Number.isFinite(delayMs) || delayMs < 0) {
        throw new AutomationError(
            `Invalid retry options: attempts=${attempts}, delayMs=${delayMs}`,
            'INVALID_RETRY_OPTIONS',
            { attempts, delayMs }
        );
    }
    return { attempts: Math.max(1, Math.floor(attempts)), delayMs };
}

/**
 * Retries a single flaky operation with a fixed delay between attempts.
 * After the last attempt the last error is rethrown unchanged.
 */
export async function retry<T>(operation: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
    const { attempts: maxAttempts, delayMs } = resolveRetryOptions(options);

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (attempt >= maxAttempts) {
                throw error;
            }
            ActionLogger.logDebug(`Attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms`, {
                error: errorMessage(error)
            });
            await sleep(delayMs);
        }
    }
}

/** Wraps `operation` so each call goes through {@link retry}; composes with `tryInOrder`. */
export function withRetry<T>(operation: () => Promise<T>, options: Partial<RetryOptions> = {}): () => Promise<T> {
    return () => retry(operation, options);
}
