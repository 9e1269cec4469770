import type { EntityCounts } from "@folio/common";
import {
	type AdminService,
	assertConfirmation,
	type ConfirmableOperation,
	ConfirmationPhrases,
	type LifecycleService,
} from "@folio/core";

/**
 * Line-oriented output, so commands can be exercised without a terminal.
 */
export interface Output {
	log(line: string): void;
	error(line: string): void;
}

export interface CliContext {
	lifecycle: LifecycleService;
	admin: AdminService;
	/** Apply the database schema */
	migrate(): Promise<void>;
	/** Ask the operator a question and return the answer */
	prompt(question: string): Promise<string>;
	out: Output;
}

export interface ConfirmOptions {
	/** Confirmation phrase given on the command line */
	confirm?: string;
	/** Skip the confirmation; ignored for wipe */
	force?: boolean;
}

export function formatCounts(counts: EntityCounts): string {
	return `${counts.pathogens} pathogen(s), ${counts.projects} project(s), ${counts.studies} study(ies)`;
}

export function isEmpty(counts: EntityCounts): boolean {
	return counts.pathogens + counts.projects + counts.studies === 0;
}

/**
 * Return the operator's confirmation phrase, from `--confirm` or the prompt.
 */
export async function readConfirmation(
	ctx: CliContext,
	operation: ConfirmableOperation,
	options: ConfirmOptions,
): Promise<string> {
	return (
		options.confirm ?? ctx.prompt(`Type "${ConfirmationPhrases[operation]}" to confirm: `)
	);
}

/**
 * @throws ConfirmationRequiredError unless `--force` applies or the phrase matches
 */
export async function confirm(
	ctx: CliContext,
	operation: ConfirmableOperation,
	options: ConfirmOptions,
): Promise<void> {
	if (options.force && operation !== "wipe") {
		return;
	}
	assertConfirmation(operation, await readConfirmation(ctx, operation, options));
}
