import { type EntityKind, FolioError, toError, ValidationError } from "@folio/common";
import type { PurgeScope } from "@folio/core";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { deleteCommand, restoreCommand } from "./commands/delete";
import { infoCommand } from "./commands/info";
import { countByOrgCommand, countCommand, type ListOptions, listCommand } from "./commands/list";
import { migrateCommand } from "./commands/migrate";
import { purgeCommand, wipeCommand } from "./commands/purge";
import type { CliContext, ConfirmOptions } from "./context";

const KINDS: readonly EntityKind[] = ["pathogen", "project", "study"];

function parseCount(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 0) {
		throw new InvalidArgumentError("Not a non-negative integer.");
	}
	return parsed;
}

function parsePrivacy(value: string): "public" | "private" {
	if (value !== "public" && value !== "private") {
		throw new InvalidArgumentError("Expected public or private.");
	}
	return value;
}

interface PurgeOptions extends ConfirmOptions {
	pathogen?: string;
	project?: string;
	study?: string;
	org?: string;
	user?: string;
}

function purgeScope(options: PurgeOptions): PurgeScope {
	const scopes: PurgeScope[] = [
		...(options.pathogen ? [{ kind: "pathogen" as const, id: options.pathogen }] : []),
		...(options.project ? [{ kind: "project" as const, id: options.project }] : []),
		...(options.study ? [{ kind: "study" as const, id: options.study }] : []),
		...(options.org ? [{ kind: "organisation" as const, organisationId: options.org }] : []),
		...(options.user ? [{ kind: "user" as const, userId: options.user }] : []),
	];
	if (scopes.length > 1) {
		throw new ValidationError("give at most one of --pathogen, --project, --study, --org, --user");
	}
	return scopes[0] ?? { kind: "all" };
}

export function createProgram(ctx: CliContext): Command {
	const program = new Command();

	program
		.name("folio-admin")
		.description("Inspect, soft-delete, restore and purge Folio data")
		.version("0.1.0")
		.exitOverride()
		.configureOutput({
			writeOut: (text) => ctx.out.log(text.trimEnd()),
			writeErr: (text) => ctx.out.error(text.trimEnd()),
		});

	// =========================================================================
	// Listings
	// =========================================================================

	program
		.command("list")
		.description("List live projects")
		.option("--limit <n>", "Maximum rows", parseCount)
		.option("--offset <n>", "Rows to skip", parseCount)
		.action((options: ListOptions) => listCommand(ctx, { state: "active" }, options));

	program
		.command("list-deleted")
		.description("List soft-deleted projects, including those hidden by a deleted pathogen")
		.action(() => listCommand(ctx, { state: "deleted" }));

	program
		.command("list-by-org")
		.description("List projects of one organisation, in any state")
		.argument("<org>", "Organisation id")
		.action((org: string) => listCommand(ctx, { organisationId: org, state: "all" }));

	program
		.command("list-by-user")
		.description("List projects created by one user, in any state")
		.argument("<user>", "Identity-provider user id")
		.action((user: string) => listCommand(ctx, { userId: user, state: "all" }));

	program
		.command("list-privacy")
		.description("List live projects with the given privacy")
		.argument("<privacy>", "public or private", parsePrivacy)
		.action((privacy: "public" | "private") => listCommand(ctx, { privacy, state: "active" }));

	program
		.command("count")
		.description("Row counts per table and state")
		.action(() => countCommand(ctx));

	program
		.command("count-by-org")
		.description("Project counts per organisation")
		.action(() => countByOrgCommand(ctx));

	for (const kind of KINDS) {
		program
			.command(`info-${kind}`)
			.description(`Show one ${kind} with its neighbours`)
			.argument("<id>", `${kind} id`)
			.action((id: string) => infoCommand(ctx, kind, id));
	}

	// =========================================================================
	// Soft delete and restore
	// =========================================================================

	for (const kind of KINDS) {
		program
			.command(`delete-${kind}`)
			.description(`Soft-delete one ${kind} and everything below it`)
			.argument("<id>", `${kind} id`)
			.option("--confirm <phrase>", "Confirmation phrase")
			.option("--force", "Skip confirmation")
			.action((id: string, options: ConfirmOptions) => deleteCommand(ctx, { kind, id }, options));
	}

	program
		.command("delete-by-org")
		.description("Soft-delete every project of one organisation, with their studies")
		.argument("<org>", "Organisation id")
		.option("--confirm <phrase>", "Confirmation phrase")
		.option("--force", "Skip confirmation")
		.action((org: string, options: ConfirmOptions) =>
			deleteCommand(ctx, { kind: "organisation", organisationId: org }, options),
		);

	program
		.command("delete-by-user")
		.description("Soft-delete every project created by one user, with their studies")
		.argument("<user>", "Identity-provider user id")
		.option("--confirm <phrase>", "Confirmation phrase")
		.option("--force", "Skip confirmation")
		.action((user: string, options: ConfirmOptions) =>
			deleteCommand(ctx, { kind: "user", userId: user }, options),
		);

	program
		.command("delete-all")
		.description("Soft-delete every live row")
		.option("--confirm <phrase>", "Confirmation phrase")
		.option("--force", "Skip confirmation")
		.action((options: ConfirmOptions) => deleteCommand(ctx, { kind: "all" }, options));

	for (const kind of KINDS) {
		program
			.command(`restore-${kind}`)
			.description(`Restore one soft-deleted ${kind}`)
			.argument("<id>", `${kind} id`)
			.option("--cascade", "Also restore rows deleted in the same operation", false)
			.action((id: string, options: { cascade: boolean }) =>
				restoreCommand(ctx, kind, id, options),
			);
	}

	// =========================================================================
	// Hard delete
	// =========================================================================

	program
		.command("purge")
		.description("Permanently delete soft-deleted rows (all of them unless a scope is given)")
		.option("--pathogen <id>", "Purge one pathogen with its projects and studies")
		.option("--project <id>", "Purge one project with its studies")
		.option("--study <id>", "Purge one study")
		.option("--org <org>", "Purge every project of one organisation")
		.option("--user <user>", "Purge every project created by one user")
		.option("--confirm <phrase>", "Confirmation phrase")
		.option("--force", "Skip confirmation")
		.action((options: PurgeOptions) => purgeCommand(ctx, purgeScope(options), options));

	program
		.command("wipe")
		.description("Permanently delete ALL rows; always asks for confirmation")
		.option("--confirm <phrase>", "Confirmation phrase")
		.action((options: Pick<ConfirmOptions, "confirm">) => wipeCommand(ctx, options));

	program
		.command("migrate")
		.description("Apply the database schema")
		.action(() => migrateCommand(ctx));

	return program;
}

/**
 * Run one command line. Errors are printed as `[CODE] message`.
 *
 * @returns the process exit code
 */
export async function run(args: readonly string[], ctx: CliContext): Promise<number> {
	const program = createProgram(ctx);

	try {
		await program.parseAsync(args, { from: "user" });
		return 0;
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode;
		}
		if (error instanceof FolioError) {
			ctx.out.error(`[${error.code}] ${error.message}`);
			return 1;
		}
		ctx.out.error(`[INTERNAL_ERROR] ${toError(error).message}`);
		return 1;
	}
}
