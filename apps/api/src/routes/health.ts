import { Hono } from "hono";

export function createHealthRoutes() {
	const app = new Hono();

	app.get("/health", (c) => {
		return c.json({
			success: true,
			data: {
				status: "healthy",
				service: "folio-api",
				version: "0.1.0",
				timestamp: new Date().toISOString(),
			},
		});
	});

	return app;
}
