import type { EntityKind } from "@folio/common";
import type { CliContext } from "../context";

/**
 * Print one row with its neighbours as JSON, soft-deleted rows included.
 */
export async function infoCommand(ctx: CliContext, kind: EntityKind, id: string): Promise<void> {
	const info = await ctx.admin.info(kind, id);
	ctx.out.log(JSON.stringify(info, null, 2));
}
