import { ErrorCodes, type ErrorCode, FolioError } from "@folio/common";
import type { Logger } from "@folio/logger";
import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";

export const ERROR_STATUS: Record<ErrorCode, ContentfulStatusCode> = {
	[ErrorCodes.NOT_FOUND]: 404,
	[ErrorCodes.CONFLICT]: 409,
	[ErrorCodes.INVALID_REFERENCE]: 422,
	[ErrorCodes.PURGE_BLOCKED]: 409,
	[ErrorCodes.CONFIRMATION_REQUIRED]: 400,
	[ErrorCodes.PROVISIONING_FAILED]: 502,
	[ErrorCodes.IDP_TIMEOUT]: 504,
	[ErrorCodes.IDP_REQUEST_FAILED]: 502,
	[ErrorCodes.VALIDATION_FAILED]: 400,
	[ErrorCodes.STORAGE_QUERY_FAILED]: 500,
};

function isErrorCode(code: string): code is ErrorCode {
	return Object.hasOwn(ERROR_STATUS, code);
}

/** Error-specific fields, without the ones the envelope already carries */
function details(error: FolioError): Record<string, unknown> | undefined {
	const { name: _name, message: _message, code: _code, cause: _cause, ...rest } = error.toJSON();
	return Object.keys(rest).length > 0 ? rest : undefined;
}

/**
 * Render any error thrown by a handler as the JSON envelope.
 */
export function createErrorHandler(logger: Logger) {
	return (err: Error, c: Context) => {
		if (err instanceof HTTPException) {
			return err.getResponse();
		}

		if (err instanceof FolioError && isErrorCode(err.code)) {
			const status = ERROR_STATUS[err.code];
			if (status >= 500) {
				logger.error({ err }, err.message);
			} else {
				logger.debug({ code: err.code }, err.message);
			}
			return c.json(
				{
					success: false,
					error: { code: err.code, message: err.message, details: details(err) },
				},
				status,
			);
		}

		logger.error({ err }, "Unhandled error");
		return c.json(
			{
				success: false,
				error: {
					code: "INTERNAL_ERROR",
					message: "An internal error occurred",
				},
			},
			500,
		);
	};
}
