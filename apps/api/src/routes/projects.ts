import { Hono } from "hono";
import type { ApiEnv } from "../middleware/auth";
import { appScopes } from "../middleware/scopes";
import {
	CreateProjectBody,
	countsToWire,
	ProjectQuery,
	projectToWire,
	ReadQuery,
	RestoreQuery,
	readBody,
	readQuery,
	UpdateProjectBody,
} from "../wire";
import type { EntityRoutesOptions } from "./pathogens";

export function createProjectRoutes(options: EntityRoutesOptions) {
	const { services, appName } = options;
	const scopes = appScopes(appName);
	const app = new Hono<ApiEnv>();

	// GET /v1/projects
	app.get("/", scopes.read, async (c) => {
		const query = readQuery(c, ProjectQuery);
		const projects = await services.projects.list({
			state: query.state,
			limit: query.limit,
			offset: query.offset,
			organisationId: query.organisation_id,
			userId: query.user_id,
			privacy: query.privacy,
			pathogenId: query.pathogen_id,
		});
		return c.json({ success: true, data: { projects: projects.map(projectToWire) } });
	});

	// POST /v1/projects - insert and provision in one transaction
	app.post("/", scopes.write, async (c) => {
		const body = await readBody(c, CreateProjectBody);
		const project = await services.projects.create(
			{
				slug: body.slug,
				name: body.name,
				description: body.description,
				organisationId: body.organisation_id,
				userId: body.user_id ?? c.get("auth").userId,
				privacy: body.privacy,
				pathogenId: body.pathogen_id,
			},
			{ signal: c.req.raw.signal },
		);
		return c.json({ success: true, data: { project: projectToWire(project) } }, 201);
	});

	// GET /v1/projects/:id
	app.get("/:id", scopes.read, async (c) => {
		const { include_deleted } = readQuery(c, ReadQuery);
		const project = await services.projects.get(c.req.param("id"), {
			includeDeleted: include_deleted === "true",
		});
		return c.json({ success: true, data: { project: projectToWire(project) } });
	});

	// PATCH /v1/projects/:id - slug is immutable
	app.patch("/:id", scopes.write, async (c) => {
		const input = await readBody(c, UpdateProjectBody);
		const project = await services.projects.update(c.req.param("id"), input);
		return c.json({ success: true, data: { project: projectToWire(project) } });
	});

	// DELETE /v1/projects/:id
	app.delete("/:id", scopes.write, async (c) => {
		const deleted = await services.lifecycle.softDelete({ kind: "project", id: c.req.param("id") });
		return c.json({ success: true, data: { deleted: countsToWire(deleted) } });
	});

	// POST /v1/projects/:id/restore
	app.post("/:id/restore", scopes.write, async (c) => {
		const { cascade } = readQuery(c, RestoreQuery);
		const restored = await services.lifecycle.restore("project", c.req.param("id"), {
			cascade: cascade === "true",
		});
		return c.json({ success: true, data: { restored: countsToWire(restored) } });
	});

	// =========================================================================
	// Authorization objects and admin group membership
	// =========================================================================

	// GET /v1/projects/:slug/resource
	app.get("/:slug/resource", scopes.read, async (c) => {
		const resource = await services.membership.getResource(c.req.param("slug"));
		return c.json({ success: true, data: { resource } });
	});

	// GET /v1/projects/:slug/group
	app.get("/:slug/group", scopes.read, async (c) => {
		const group = await services.membership.getGroup(c.req.param("slug"));
		return c.json({ success: true, data: { group } });
	});

	// GET /v1/projects/:slug/group/members
	app.get("/:slug/group/members", scopes.read, async (c) => {
		const members = await services.membership.listMembers(c.req.param("slug"));
		return c.json({
			success: true,
			data: { members: members.map((m) => ({ id: m.id, username: m.username })) },
		});
	});

	// POST /v1/projects/:slug/group/members/:username
	app.post("/:slug/group/members/:username", scopes.write, async (c) => {
		const added = await services.membership.addMember(c.req.param("slug"), c.req.param("username"));
		return c.json({ success: true, data: { added } }, added ? 201 : 200);
	});

	// DELETE /v1/projects/:slug/group/members/:username
	app.delete("/:slug/group/members/:username", scopes.write, async (c) => {
		await services.membership.removeMember(c.req.param("slug"), c.req.param("username"));
		return c.json({ success: true, data: { removed: true } });
	});

	return app;
}
