/**
 * Soft delete and restore.
 */

import type { EntityKind } from "@folio/common";
import type { ConfirmableOperation, DeleteTarget } from "@folio/core";
import { type CliContext, type ConfirmOptions, confirm, formatCounts, isEmpty } from "../context";

const OPERATIONS = {
	pathogen: "delete-pathogen",
	project: "delete-project",
	study: "delete-study",
	organisation: "delete-by-org",
	user: "delete-by-user",
	all: "delete-all",
} as const satisfies Record<DeleteTarget["kind"], ConfirmableOperation>;

export async function deleteCommand(
	ctx: CliContext,
	target: DeleteTarget,
	options: ConfirmOptions,
): Promise<void> {
	const preview = await ctx.lifecycle.previewSoftDelete(target);
	if (isEmpty(preview)) {
		ctx.out.log("Nothing to delete.");
		return;
	}

	ctx.out.log(`Will soft-delete ${formatCounts(preview)}.`);
	await confirm(ctx, OPERATIONS[target.kind], options);

	const deleted = await ctx.lifecycle.softDelete(target);
	ctx.out.log(`Soft-deleted ${formatCounts(deleted)}.`);
}

export async function restoreCommand(
	ctx: CliContext,
	kind: EntityKind,
	id: string,
	options: { cascade?: boolean },
): Promise<void> {
	const restored = await ctx.lifecycle.restore(kind, id, { cascade: options.cascade ?? false });
	ctx.out.log(isEmpty(restored) ? "Nothing to restore." : `Restored ${formatCounts(restored)}.`);
}
