/**
 * Root of the Folio error hierarchy.
 *
 * @module @folio/common/errors/base
 */

/**
 * Error with a machine-readable code. The API maps codes to HTTP statuses;
 * subclasses add the fields that go into the response details.
 */
export class FolioError extends Error {
	/** SCREAMING_SNAKE_CASE, e.g. "PURGE_BLOCKED" */
	public readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, cause ? { cause } : undefined);
		this.name = "FolioError";
		this.code = code;
	}

	/**
	 * Plain fields for logs and response details. The cause is reduced to
	 * its name and message.
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			cause:
				this.cause instanceof Error ? { name: this.cause.name, message: this.cause.message } : undefined,
		};
	}
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) {
		return value;
	}
	return new Error(typeof value === "string" ? value : JSON.stringify(value));
}
