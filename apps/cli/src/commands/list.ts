/**
 * Read-only listings and counts.
 */

import type { Project, ProjectFilter } from "@folio/core";
import type { CliContext } from "../context";

export interface ListOptions {
	limit?: number;
	offset?: number;
}

function describeProject(p: Project): string {
	const deleted = p.deletedAt ? `  deleted ${p.deletedAt.toISOString()}` : "";
	return `${p.id}  ${p.slug}  org=${p.organisationId}  user=${p.userId}  ${p.privacy}${deleted}`;
}

export async function listCommand(
	ctx: CliContext,
	filter: ProjectFilter,
	options: ListOptions = {},
): Promise<void> {
	const projects = await ctx.admin.listProjects({ ...filter, ...options });

	if (projects.length === 0) {
		ctx.out.log("No projects found.");
		return;
	}

	ctx.out.log(`Projects (${projects.length})`);
	for (const project of projects) {
		ctx.out.log(describeProject(project));
	}
}

export async function countCommand(ctx: CliContext): Promise<void> {
	const counts = await ctx.admin.counts();
	const row = (name: string, ...cells: Array<string | number>) =>
		`${name.padEnd(10)}${cells.map((cell) => ` ${String(cell).padStart(7)}`).join("")}`;

	ctx.out.log(row("", "active", "deleted", "total"));
	for (const name of ["pathogens", "projects", "studies"] as const) {
		const c = counts[name];
		ctx.out.log(row(name, c.active, c.deleted, c.total));
	}
}

export async function countByOrgCommand(ctx: CliContext): Promise<void> {
	const rows = await ctx.admin.countByOrganisation();

	if (rows.length === 0) {
		ctx.out.log("No projects found.");
		return;
	}

	for (const r of rows) {
		ctx.out.log(
			`${r.organisationId}: ${r.totalProjects} project(s) (${r.publicProjects} public, ${r.privateProjects} private; ${r.activeProjects} active, ${r.deletedProjects} deleted)`,
		);
	}
}
