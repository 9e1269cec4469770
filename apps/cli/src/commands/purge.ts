/**
 * Hard deletes.
 */

import { PurgeBlockedError } from "@folio/common";
import type { PurgeScope } from "@folio/core";
import {
	type CliContext,
	type ConfirmOptions,
	confirm,
	formatCounts,
	isEmpty,
	readConfirmation,
} from "../context";

export async function purgeCommand(
	ctx: CliContext,
	scope: PurgeScope,
	options: ConfirmOptions,
): Promise<void> {
	const { toDelete, blockers } = await ctx.lifecycle.previewPurge(scope);
	if (!isEmpty(blockers)) {
		ctx.out.log(`Active rows in scope: ${formatCounts(blockers)}. Soft-delete them first.`);
		throw new PurgeBlockedError(blockers);
	}
	if (isEmpty(toDelete)) {
		ctx.out.log("Nothing to purge.");
		return;
	}

	ctx.out.log(`Will permanently delete ${formatCounts(toDelete)}.`);
	await confirm(ctx, "purge", options);

	const purged = await ctx.lifecycle.purge(scope);
	ctx.out.log(`Purged ${formatCounts(purged)}.`);
}

/**
 * Delete every row, live or not. Always asks for the phrase.
 */
export async function wipeCommand(ctx: CliContext, options: Pick<ConfirmOptions, "confirm">): Promise<void> {
	const total = await ctx.lifecycle.previewWipe();

	ctx.out.log(`Will permanently delete ALL data: ${formatCounts(total)}.`);
	const wiped = await ctx.lifecycle.wipe(await readConfirmation(ctx, "wipe", options));
	ctx.out.log(`Wiped ${formatCounts(wiped)}.`);
}
