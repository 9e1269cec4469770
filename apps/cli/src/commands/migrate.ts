import type { CliContext } from "../context";

export async function migrateCommand(ctx: CliContext): Promise<void> {
	await ctx.migrate();
	ctx.out.log("Schema is up to date.");
}
