#!/usr/bin/env tsx
/**
 * Folio administration CLI
 */

import { createInterface } from "node:readline/promises";
import {
	AdminService,
	type Deprovisioner,
	LifecycleService,
	PostgresEntityStore,
	ProvisioningService,
	runMigrations,
} from "@folio/core";
import { KeycloakAdminClient } from "@folio/keycloak";
import { createNodeLogger, type Logger, pino } from "@folio/logger";
import { PostgresClient } from "@folio/storage";
import { type CliConfig, loadCliConfig } from "./config";
import { run } from "./program";

async function prompt(question: string): Promise<string> {
	const rl = createInterface({ input: process.stdin, output: process.stdout });
	try {
		return await rl.question(question);
	} finally {
		rl.close();
	}
}

function createDeprovisioner(config: CliConfig, logger: Logger): Deprovisioner | undefined {
	if (!config.keycloak) {
		logger.warn("KEYCLOAK_CLIENT_SECRET not set, purge and wipe keep identity-provider objects");
		return undefined;
	}
	const idp = new KeycloakAdminClient({
		...config.keycloak,
		timeoutMs: config.idpTimeoutMs,
		logger: logger.child({ component: "keycloak" }),
	});
	return new ProvisioningService({
		idp,
		appName: config.appName,
		logger: logger.child({ component: "provisioning" }),
	});
}

async function main(): Promise<number> {
	const config = loadCliConfig();
	const logger = createNodeLogger(
		{ service: "folio-cli", level: config.logLevel, base: { component: "cli" } },
		pino.destination(2),
	);

	const postgresClient = new PostgresClient({ url: config.postgresUrl });
	await postgresClient.connect();

	try {
		const store = new PostgresEntityStore(postgresClient);
		return await run(process.argv.slice(2), {
			lifecycle: new LifecycleService(store, {
				logger: logger.child({ component: "lifecycle" }),
				deprovisioner: createDeprovisioner(config, logger),
			}),
			admin: new AdminService(store),
			migrate: () => runMigrations(postgresClient, logger),
			prompt,
			out: {
				log: (line) => console.log(line),
				error: (line) => console.error(line),
			},
		});
	} finally {
		await postgresClient.disconnect();
	}
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(err) => {
		console.error(`[INTERNAL_ERROR] ${err instanceof Error ? err.message : String(err)}`);
		process.exitCode = 1;
	},
);
