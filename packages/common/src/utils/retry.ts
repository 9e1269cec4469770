/**
 * Retry utilities.
 *
 * Retry logic with bounded exponential backoff for transient failures.
 *
 * @module @folio/common/utils/retry
 */

import { isTransientError } from "../errors/domain";

/**
 * Options for the retry function.
 */
export interface RetryOptions {
	/** Maximum number of retry attempts after the first call (default: 2) */
	maxRetries?: number;
	/** Initial delay in milliseconds (default: 250) */
	initialDelayMs?: number;
	/** Maximum delay in milliseconds (default: 5000) */
	maxDelayMs?: number;
	/** Backoff multiplier (default: 2) */
	backoffMultiplier?: number;
	/** Jitter factor 0-1 to add randomness (default: 0.1) */
	jitter?: number;
	/** Function to determine if error is retryable (default: identity-provider transient errors) */
	isRetryable?: (error: unknown) => boolean;
	/** Callback invoked before each retry */
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
	/** Stops retrying (and interrupts the backoff wait) once aborted */
	signal?: AbortSignal;
}

/**
 * Sleep for the specified duration, waking early if the signal aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		const timer = setTimeout(done, ms);
		function done() {
			clearTimeout(timer);
			signal?.removeEventListener("abort", done);
			resolve();
		}
		signal?.addEventListener("abort", done, { once: true });
	});
}

/**
 * Calculate delay with exponential backoff and jitter.
 */
export function calculateDelay(
	attempt: number,
	initialDelayMs: number,
	maxDelayMs: number,
	backoffMultiplier: number,
	jitter: number,
): number {
	const exponentialDelay = initialDelayMs * backoffMultiplier ** attempt;
	const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
	const jitterAmount = cappedDelay * jitter * Math.random();

	return Math.floor(cappedDelay + jitterAmount);
}

/**
 * Execute a function with retry logic and exponential backoff.
 *
 * @throws The last error once retries are exhausted, the error is not
 * retryable, or the signal has aborted
 *
 * @example
 * ```ts
 * const group = await withRetry(() => idp.ensureGroup(input), {
 *   maxRetries: 2,
 *   onRetry: (e, attempt) => logger.warn({ e, attempt }, "retrying"),
 * });
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const {
		maxRetries = 2,
		initialDelayMs = 250,
		maxDelayMs = 5000,
		backoffMultiplier = 2,
		jitter = 0.1,
		isRetryable = isTransientError,
		onRetry,
		signal,
	} = options;

	let attempt = 0;

	while (true) {
		try {
			return await fn();
		} catch (error) {
			if (attempt >= maxRetries || signal?.aborted || !isRetryable(error)) {
				throw error;
			}

			const delayMs = calculateDelay(
				attempt,
				initialDelayMs,
				maxDelayMs,
				backoffMultiplier,
				jitter,
			);

			onRetry?.(error, attempt + 1, delayMs);

			await sleep(delayMs, signal);
			if (signal?.aborted) {
				throw error;
			}

			attempt++;
		}
	}
}
