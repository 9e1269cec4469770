import { ConfirmationRequiredError } from "@folio/common";

/**
 * Literal phrases that unlock each destructive operation.
 */
export const ConfirmationPhrases = {
	"delete-pathogen": "DELETE PATHOGEN",
	"delete-project": "DELETE PROJECT",
	"delete-study": "DELETE STUDY",
	"delete-by-org": "DELETE ORGANISATION",
	"delete-by-user": "DELETE USER",
	"delete-all": "DELETE ALL",
	purge: "PURGE ALL",
	wipe: "WIPE ALL DATA",
} as const;

export type ConfirmableOperation = keyof typeof ConfirmationPhrases;

/**
 * @throws ConfirmationRequiredError unless `phrase` matches exactly
 */
export function assertConfirmation(operation: ConfirmableOperation, phrase: string | undefined): void {
	const expected = ConfirmationPhrases[operation];
	if (phrase !== expected) {
		throw new ConfirmationRequiredError(operation, expected);
	}
}
