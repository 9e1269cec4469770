import { Hono } from "hono";
import type { ApiEnv, AuthContext } from "../middleware/auth";
import { appScopes } from "../middleware/scopes";

function caller(auth: AuthContext) {
	return { id: auth.userId, username: auth.username ?? null };
}

/**
 * Endpoints for checking a token against the application scopes.
 */
export function createAuthTestRoutes(options: { appName: string }) {
	const scopes = appScopes(options.appName);
	const app = new Hono<ApiEnv>();

	// GET /v1/auth/test - any valid token
	app.get("/test", (c) =>
		c.json({
			success: true,
			data: { message: "Hello from Folio!", user: caller(c.get("auth")), status: "authenticated" },
		}),
	);

	app.get("/test/read", scopes.read, (c) =>
		c.json({
			success: true,
			data: {
				message: "You have READ access!",
				user: caller(c.get("auth")),
				action: "read",
				status: "authorized",
			},
		}),
	);

	app.get("/test/write", scopes.write, (c) =>
		c.json({
			success: true,
			data: {
				message: "You have WRITE access!",
				user: caller(c.get("auth")),
				action: "write",
				status: "authorized",
			},
		}),
	);

	// POST /v1/auth/test/admin - both scopes
	app.post("/test/admin", scopes.read, scopes.write, (c) =>
		c.json({
			success: true,
			data: {
				message: "You have full READ and WRITE access!",
				user: caller(c.get("auth")),
				action: "admin",
				status: "authorized",
			},
		}),
	);

	return app;
}
