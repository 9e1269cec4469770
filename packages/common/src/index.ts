/**
 * @folio/common - Shared errors and utilities for Folio.
 *
 * @example
 * ```ts
 * import { NotFoundError, withRetry } from "@folio/common";
 * ```
 *
 * @module @folio/common
 */

// =============================================================================
// Utils
// =============================================================================

export type { RetryOptions } from "./utils";
export { calculateDelay, envNum, envOptional, envRequired, envStr, withRetry } from "./utils";

// =============================================================================
// Errors
// =============================================================================

export type { EntityCounts, EntityKind, ErrorCode, LookupKind, ProvisioningStep } from "./errors";
export {
	ConfirmationRequiredError,
	ConflictError,
	ErrorCodes,
	FolioError,
	IdentityProviderError,
	InvalidReferenceError,
	isTransientError,
	NotFoundError,
	ProvisioningFailedError,
	ProvisioningSteps,
	PurgeBlockedError,
	StorageError,
	TimeoutError,
	toError,
	ValidationError,
} from "./errors";
