import { createFolioServices, PostgresEntityStore, runMigrations } from "@folio/core";
import { KeycloakAdminClient } from "@folio/keycloak";
import { createNodeLogger } from "@folio/logger";
import { PostgresClient } from "@folio/storage";
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadConfig } from "./config";

async function main() {
	const config = loadConfig();
	const logger = createNodeLogger({
		service: "folio-api",
		level: config.logLevel,
		base: { component: "api" },
	});

	logger.info({ port: config.port, appName: config.appName }, "Starting Folio API");

	const postgresClient = new PostgresClient({ url: config.postgresUrl });
	await postgresClient.connect();
	logger.info("Connected to PostgreSQL");

	await runMigrations(postgresClient, logger);

	const idp = new KeycloakAdminClient({
		...config.keycloak,
		timeoutMs: config.idpTimeoutMs,
		logger: logger.child({ component: "keycloak" }),
	});

	const services = createFolioServices({
		store: new PostgresEntityStore(postgresClient),
		idp,
		appName: config.appName,
		logger,
		uniquenessScope: config.uniquenessScope,
		retry: { maxAttempts: config.idpMaxAttempts },
	});

	const app = createApp({ services, idp, appName: config.appName, logger });

	const server = serve({ fetch: app.fetch, port: config.port });
	logger.info({ port: config.port }, "Folio API ready");

	// Graceful shutdown
	const shutdown = async () => {
		logger.info("Shutting down...");
		server.close();
		await postgresClient.disconnect();
		process.exit(0);
	};

	process.on("SIGINT", () => void shutdown());
	process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
	// main() may have failed before the logger was created
	const fallbackLogger = createNodeLogger({
		service: "folio-api",
		level: "error",
		base: { component: "api" },
	});
	fallbackLogger.error({ err }, "Fatal error");
	process.exit(1);
});
