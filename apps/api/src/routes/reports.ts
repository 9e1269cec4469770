import { Hono } from "hono";
import type { ApiEnv } from "../middleware/auth";
import { appScopes } from "../middleware/scopes";
import {
	ProjectQuery,
	projectDetailsToWire,
	readQuery,
	StudyQuery,
	studyDetailsToWire,
} from "../wire";
import type { EntityRoutesOptions } from "./pathogens";

/**
 * Read-only views over live rows. The `state` filter does not apply.
 */
export function createReportRoutes(options: EntityRoutesOptions) {
	const { services, appName } = options;
	const scopes = appScopes(appName);
	const app = new Hono<ApiEnv>();

	// GET /v1/reports/projects
	app.get("/projects", scopes.read, async (c) => {
		const query = readQuery(c, ProjectQuery);
		const rows = await services.admin.projectReport({
			limit: query.limit,
			offset: query.offset,
			organisationId: query.organisation_id,
			userId: query.user_id,
			privacy: query.privacy,
			pathogenId: query.pathogen_id,
		});
		return c.json({ success: true, data: { projects: rows.map(projectDetailsToWire) } });
	});

	// GET /v1/reports/studies
	app.get("/studies", scopes.read, async (c) => {
		const query = readQuery(c, StudyQuery);
		const rows = await services.admin.studyReport({
			limit: query.limit,
			offset: query.offset,
			projectId: query.project_id,
			organisationId: query.organisation_id,
			userId: query.user_id,
		});
		return c.json({ success: true, data: { studies: rows.map(studyDetailsToWire) } });
	});

	return app;
}
