import type { Queryable } from "@folio/storage";
import type { Repositories } from "../repositories";
import { PostgresPathogenRepository } from "./pathogens";
import { PostgresProjectRepository } from "./projects";
import { PostgresReportRepository } from "./reports";
import { PostgresStudyRepository } from "./studies";

export { translateDbError } from "./errors";
export { runMigrations, SCHEMA_PATH } from "./migrate";
export { PostgresPathogenRepository } from "./pathogens";
export { PostgresProjectRepository } from "./projects";
export { PostgresReportRepository } from "./reports";
export { isUuid, QueryBuilder } from "./sql";
export { PostgresStudyRepository } from "./studies";

/**
 * Bind every repository to one connection or transaction session.
 */
export function createPostgresRepositories(db: Queryable): Repositories {
	return {
		pathogens: new PostgresPathogenRepository(db),
		projects: new PostgresProjectRepository(db),
		studies: new PostgresStudyRepository(db),
		reports: new PostgresReportRepository(db),
	};
}
