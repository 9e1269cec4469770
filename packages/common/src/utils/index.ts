/**
 * Utility functions for Folio.
 *
 * @module @folio/common/utils
 */

export { envNum, envOptional, envRequired, envStr } from "./env";
export type { RetryOptions } from "./retry";
export { calculateDelay, withRetry } from "./retry";
