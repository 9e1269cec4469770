import type { FolioServices } from "@folio/core";
import type { IdentityProvider } from "@folio/keycloak";
import type { Logger } from "@folio/logger";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger as honoLogger } from "hono/logger";
import { createErrorHandler } from "./errors";
import { type ApiEnv, auth } from "./middleware/auth";
import { createAuthTestRoutes } from "./routes/auth";
import { createHealthRoutes } from "./routes/health";
import { createPathogenRoutes } from "./routes/pathogens";
import { createProjectRoutes } from "./routes/projects";
import { createReportRoutes } from "./routes/reports";
import { createStudyRoutes } from "./routes/studies";

export interface AppOptions {
	services: FolioServices;
	/** Used for RPT exchange on every request */
	idp: IdentityProvider;
	/** Resource name API scopes are checked against (`<appName>.READ`, `<appName>.WRITE`) */
	appName: string;
	logger: Logger;
}

export function createApp(options: AppOptions) {
	const { services, idp, appName, logger } = options;
	const app = new Hono();

	// Global middleware
	app.use("*", cors());
	app.use("*", honoLogger((message) => logger.debug(message)));

	// Health routes (no auth)
	app.route("/", createHealthRoutes());

	// Protected routes
	const protectedRoutes = new Hono<ApiEnv>();
	protectedRoutes.use("*", auth({ idp, logger }));

	protectedRoutes.route("/pathogens", createPathogenRoutes({ services, appName }));
	protectedRoutes.route("/projects", createProjectRoutes({ services, appName }));
	protectedRoutes.route("/studies", createStudyRoutes({ services, appName }));
	protectedRoutes.route("/reports", createReportRoutes({ services, appName }));
	protectedRoutes.route("/auth", createAuthTestRoutes({ appName }));

	app.route("/v1", protectedRoutes);

	app.onError(createErrorHandler(logger));

	app.notFound((c) => {
		return c.json(
			{
				success: false,
				error: {
					code: "NOT_FOUND",
					message: "Endpoint not found",
				},
			},
			404,
		);
	});

	return app;
}
