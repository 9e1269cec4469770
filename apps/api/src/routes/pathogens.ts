import type { FolioServices } from "@folio/core";
import { Hono } from "hono";
import type { ApiEnv } from "../middleware/auth";
import { appScopes } from "../middleware/scopes";
import {
	CreatePathogenBody,
	countsToWire,
	PathogenQuery,
	pathogenToWire,
	ReadQuery,
	RestoreQuery,
	readBody,
	readQuery,
	UpdatePathogenBody,
} from "../wire";

export interface EntityRoutesOptions {
	services: FolioServices;
	appName: string;
}

export function createPathogenRoutes(options: EntityRoutesOptions) {
	const { services, appName } = options;
	const scopes = appScopes(appName);
	const app = new Hono<ApiEnv>();

	// GET /v1/pathogens
	app.get("/", scopes.read, async (c) => {
		const query = readQuery(c, PathogenQuery);
		const pathogens = await services.pathogens.list(query);
		return c.json({ success: true, data: { pathogens: pathogens.map(pathogenToWire) } });
	});

	// POST /v1/pathogens
	app.post("/", scopes.write, async (c) => {
		const input = await readBody(c, CreatePathogenBody);
		const pathogen = await services.pathogens.create(input);
		return c.json({ success: true, data: { pathogen: pathogenToWire(pathogen) } }, 201);
	});

	// GET /v1/pathogens/:id
	app.get("/:id", scopes.read, async (c) => {
		const { include_deleted } = readQuery(c, ReadQuery);
		const pathogen = await services.pathogens.get(c.req.param("id"), {
			includeDeleted: include_deleted === "true",
		});
		return c.json({ success: true, data: { pathogen: pathogenToWire(pathogen) } });
	});

	// PATCH /v1/pathogens/:id
	app.patch("/:id", scopes.write, async (c) => {
		const input = await readBody(c, UpdatePathogenBody);
		const pathogen = await services.pathogens.update(c.req.param("id"), input);
		return c.json({ success: true, data: { pathogen: pathogenToWire(pathogen) } });
	});

	// DELETE /v1/pathogens/:id - soft delete with its projects and studies
	app.delete("/:id", scopes.write, async (c) => {
		const deleted = await services.lifecycle.softDelete({ kind: "pathogen", id: c.req.param("id") });
		return c.json({ success: true, data: { deleted: countsToWire(deleted) } });
	});

	// POST /v1/pathogens/:id/restore
	app.post("/:id/restore", scopes.write, async (c) => {
		const { cascade } = readQuery(c, RestoreQuery);
		const restored = await services.lifecycle.restore("pathogen", c.req.param("id"), {
			cascade: cascade === "true",
		});
		return c.json({ success: true, data: { restored: countsToWire(restored) } });
	});

	return app;
}
