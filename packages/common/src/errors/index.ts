/**
 * Error types for Folio.
 *
 * @module @folio/common/errors
 */

export { FolioError, toError } from "./base";
export type { EntityCounts, EntityKind, ErrorCode, LookupKind, ProvisioningStep } from "./domain";
export {
	ConfirmationRequiredError,
	ConflictError,
	ErrorCodes,
	IdentityProviderError,
	InvalidReferenceError,
	isTransientError,
	NotFoundError,
	ProvisioningFailedError,
	ProvisioningSteps,
	PurgeBlockedError,
	StorageError,
	TimeoutError,
	ValidationError,
} from "./domain";
