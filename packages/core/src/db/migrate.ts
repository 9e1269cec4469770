import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { Logger } from "@folio/logger";
import type { Queryable } from "@folio/storage";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const SCHEMA_PATH = join(__dirname, "schema.sql");

/**
 * Apply the schema. Every statement in it is idempotent.
 */
export async function runMigrations(db: Queryable, logger: Logger): Promise<void> {
	logger.info("Running database migrations");

	try {
		const schema = await readFile(SCHEMA_PATH, "utf-8");
		await db.query(schema);

		logger.info("Database migrations completed successfully");
	} catch (error) {
		logger.error({ err: error }, "Failed to run database migrations");
		throw error;
	}
}
