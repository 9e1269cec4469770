import { Hono } from "hono";
import type { ApiEnv } from "../middleware/auth";
import { appScopes } from "../middleware/scopes";
import {
	CreateStudyBody,
	countsToWire,
	ReadQuery,
	readBody,
	readQuery,
	StudyQuery,
	studyToWire,
	UpdateStudyBody,
} from "../wire";
import type { EntityRoutesOptions } from "./pathogens";

export function createStudyRoutes(options: EntityRoutesOptions) {
	const { services, appName } = options;
	const scopes = appScopes(appName);
	const app = new Hono<ApiEnv>();

	// GET /v1/studies
	app.get("/", scopes.read, async (c) => {
		const query = readQuery(c, StudyQuery);
		const studies = await services.studies.list({
			state: query.state,
			limit: query.limit,
			offset: query.offset,
			projectId: query.project_id,
			organisationId: query.organisation_id,
			userId: query.user_id,
		});
		return c.json({ success: true, data: { studies: studies.map(studyToWire) } });
	});

	// POST /v1/studies
	app.post("/", scopes.write, async (c) => {
		const input = await readBody(c, CreateStudyBody);
		const study = await services.studies.create(input);
		return c.json({ success: true, data: { study: studyToWire(study) } }, 201);
	});

	// GET /v1/studies/:id
	app.get("/:id", scopes.read, async (c) => {
		const { include_deleted } = readQuery(c, ReadQuery);
		const study = await services.studies.get(c.req.param("id"), {
			includeDeleted: include_deleted === "true",
		});
		return c.json({ success: true, data: { study: studyToWire(study) } });
	});

	// PATCH /v1/studies/:id
	app.patch("/:id", scopes.write, async (c) => {
		const input = await readBody(c, UpdateStudyBody);
		const study = await services.studies.update(c.req.param("id"), input);
		return c.json({ success: true, data: { study: studyToWire(study) } });
	});

	// DELETE /v1/studies/:id
	app.delete("/:id", scopes.write, async (c) => {
		const deleted = await services.lifecycle.softDelete({ kind: "study", id: c.req.param("id") });
		return c.json({ success: true, data: { deleted: countsToWire(deleted) } });
	});

	// POST /v1/studies/:id/restore
	app.post("/:id/restore", scopes.write, async (c) => {
		const restored = await services.lifecycle.restore("study", c.req.param("id"));
		return c.json({ success: true, data: { restored: countsToWire(restored) } });
	});

	return app;
}
