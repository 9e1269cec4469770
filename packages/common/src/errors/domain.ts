/**
 * Domain-specific error classes for Folio.
 *
 * @module @folio/common/errors/domain
 */

import { FolioError } from "./base";

/**
 * Error codes for domain errors.
 */
export const ErrorCodes = {
	// Entity store
	NOT_FOUND: "NOT_FOUND",
	CONFLICT: "CONFLICT",
	INVALID_REFERENCE: "INVALID_REFERENCE",
	STORAGE_QUERY_FAILED: "STORAGE_QUERY_FAILED",

	// Lifecycle
	PURGE_BLOCKED: "PURGE_BLOCKED",
	CONFIRMATION_REQUIRED: "CONFIRMATION_REQUIRED",

	// Identity provider
	PROVISIONING_FAILED: "PROVISIONING_FAILED",
	IDP_TIMEOUT: "IDP_TIMEOUT",
	IDP_REQUEST_FAILED: "IDP_REQUEST_FAILED",

	// Validation
	VALIDATION_FAILED: "VALIDATION_FAILED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type EntityKind = "pathogen" | "project" | "study";

/** Anything a lookup can miss: stored entities plus identity-provider objects */
export type LookupKind = EntityKind | "user" | "group" | "resource";

/**
 * Thrown when an entity id does not resolve (absent, hard-deleted, or hidden
 * from the default read path).
 *
 * @example
 * ```ts
 * throw new NotFoundError("project", projectId);
 * ```
 */
export class NotFoundError extends FolioError {
	public readonly entity: LookupKind;
	public readonly entityId: string;

	constructor(entity: LookupKind, entityId: string, cause?: Error) {
		super(`${entity} '${entityId}' not found`, ErrorCodes.NOT_FOUND, cause);
		this.name = "NotFoundError";
		this.entity = entity;
		this.entityId = entityId;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			entity: this.entity,
			entityId: this.entityId,
		};
	}
}

/**
 * Thrown on a uniqueness violation (pathogen name, project slug, study_id).
 */
export class ConflictError extends FolioError {
	public readonly entity: EntityKind;
	/** Column that collided */
	public readonly field: string;
	public readonly value: string;

	constructor(entity: EntityKind, field: string, value: string, cause?: Error) {
		super(`${entity} with ${field} '${value}' already exists`, ErrorCodes.CONFLICT, cause);
		this.name = "ConflictError";
		this.entity = entity;
		this.field = field;
		this.value = value;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			entity: this.entity,
			field: this.field,
			value: this.value,
		};
	}
}

/**
 * Thrown when a referenced pathogen or project does not resolve, or is
 * soft-deleted.
 */
export class InvalidReferenceError extends FolioError {
	public readonly entity: EntityKind;
	public readonly referenceId: string;

	constructor(entity: EntityKind, referenceId: string, message?: string, cause?: Error) {
		super(
			message ?? `referenced ${entity} '${referenceId}' does not exist`,
			ErrorCodes.INVALID_REFERENCE,
			cause,
		);
		this.name = "InvalidReferenceError";
		this.entity = entity;
		this.referenceId = referenceId;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			entity: this.entity,
			referenceId: this.referenceId,
		};
	}
}

/**
 * Row counts per entity table.
 */
export interface EntityCounts {
	pathogens: number;
	projects: number;
	studies: number;
}

/**
 * Thrown when a purge would touch a row that is still active.
 * Nothing is deleted when this is raised.
 */
export class PurgeBlockedError extends FolioError {
	/** Active rows found in the purge closure */
	public readonly active: EntityCounts;

	constructor(active: EntityCounts) {
		super(
			`purge blocked: ${active.pathogens} pathogen(s), ${active.projects} project(s) and ${active.studies} study(ies) in scope are still active`,
			ErrorCodes.PURGE_BLOCKED,
		);
		this.name = "PurgeBlockedError";
		this.active = active;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			active: this.active,
		};
	}
}

/**
 * Thrown when a destructive operation is invoked without its literal
 * confirmation phrase.
 */
export class ConfirmationRequiredError extends FolioError {
	public readonly operation: string;
	public readonly expected: string;

	constructor(operation: string, expected: string) {
		super(
			`${operation} requires the confirmation phrase '${expected}'`,
			ErrorCodes.CONFIRMATION_REQUIRED,
		);
		this.name = "ConfirmationRequiredError";
		this.operation = operation;
		this.expected = expected;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			operation: this.operation,
			expected: this.expected,
		};
	}
}

/**
 * Steps of the project authorization saga, in execution order.
 */
export const ProvisioningSteps = [
	"create-resource",
	"create-group",
	"add-member",
	"create-policy",
	"create-permission",
] as const;

export type ProvisioningStep = (typeof ProvisioningSteps)[number];

/**
 * Thrown when the authorization saga for a project is aborted.
 *
 * @example
 * ```ts
 * throw new ProvisioningFailedError("covid-survey", "create-permission", cause, []);
 * ```
 */
export class ProvisioningFailedError extends FolioError {
	public readonly slug: string;
	public readonly step: ProvisioningStep;
	/** Compensations that failed; non-empty means identity-provider leftovers */
	public readonly compensationFailures: readonly string[];

	constructor(
		slug: string,
		step: ProvisioningStep,
		cause?: Error,
		compensationFailures: readonly string[] = [],
	) {
		super(
			`provisioning for project '${slug}' failed at step '${step}'`,
			ErrorCodes.PROVISIONING_FAILED,
			cause,
		);
		this.name = "ProvisioningFailedError";
		this.slug = slug;
		this.step = step;
		this.compensationFailures = compensationFailures;
	}

	get rolledBack(): boolean {
		return this.compensationFailures.length === 0;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			slug: this.slug,
			step: this.step,
			rolledBack: this.rolledBack,
			compensationFailures: this.compensationFailures,
		};
	}
}

/**
 * Thrown when an identity-provider call exceeds its deadline.
 */
export class TimeoutError extends FolioError {
	public readonly operation: string;
	public readonly timeoutMs: number;

	constructor(operation: string, timeoutMs: number) {
		super(`${operation} timed out after ${timeoutMs}ms`, ErrorCodes.IDP_TIMEOUT);
		this.name = "TimeoutError";
		this.operation = operation;
		this.timeoutMs = timeoutMs;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			operation: this.operation,
			timeoutMs: this.timeoutMs,
		};
	}
}

/**
 * Thrown when the identity provider answers with a non-success status or
 * cannot be reached (status 0).
 */
export class IdentityProviderError extends FolioError {
	public readonly operation: string;
	public readonly status: number;
	public readonly detail?: string;

	constructor(operation: string, status: number, detail?: string, cause?: Error) {
		super(
			status > 0
				? `${operation} failed with HTTP ${status}`
				: `${operation} failed: ${cause?.message ?? "network error"}`,
			ErrorCodes.IDP_REQUEST_FAILED,
			cause,
		);
		this.name = "IdentityProviderError";
		this.operation = operation;
		this.status = status;
		this.detail = detail ? detail.slice(0, 500) : undefined;
	}

	/** Network failures, 429 and 5xx are worth retrying */
	get transient(): boolean {
		return this.status === 0 || this.status === 429 || this.status >= 500;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			operation: this.operation,
			status: this.status,
			detail: this.detail,
		};
	}
}

/**
 * Error for validation failures.
 *
 * @example
 * ```ts
 * throw new ValidationError("slug is immutable", "slug");
 * ```
 */
export class ValidationError extends FolioError {
	/**
	 * The field or property that failed validation.
	 */
	public readonly field?: string;

	/**
	 * Individual issues, e.g. from a zod parse.
	 */
	public readonly issues: readonly string[];

	constructor(message: string, field?: string, issues: readonly string[] = [], cause?: Error) {
		super(message, ErrorCodes.VALIDATION_FAILED, cause);
		this.name = "ValidationError";
		this.field = field;
		this.issues = issues;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			field: this.field,
			issues: this.issues,
		};
	}
}

/**
 * Error for database operations that fail for reasons other than the
 * constraint violations mapped to Conflict/InvalidReference.
 */
export class StorageError extends FolioError {
	/** SQLSTATE reported by the server, if any */
	public readonly sqlState?: string;

	constructor(message: string, sqlState?: string, cause?: Error) {
		super(message, ErrorCodes.STORAGE_QUERY_FAILED, cause);
		this.name = "StorageError";
		this.sqlState = sqlState;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			sqlState: this.sqlState,
		};
	}
}

/**
 * Whether an error from an identity-provider call should be retried.
 */
export function isTransientError(error: unknown): boolean {
	if (error instanceof TimeoutError) {
		return true;
	}
	if (error instanceof IdentityProviderError) {
		return error.transient;
	}
	return false;
}
