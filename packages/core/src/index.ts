/**
 * @folio/core - Entity store, soft-delete lifecycle and project
 * authorization provisioning.
 *
 * @example
 * ```ts
 * import { createFolioServices, PostgresEntityStore } from "@folio/core";
 *
 * const services = createFolioServices({
 *   store: new PostgresEntityStore(db),
 *   idp,
 *   appName: "folio",
 *   logger,
 * });
 * const project = await services.projects.create(input);
 * ```
 *
 * @module @folio/core
 */

// =============================================================================
// Types
// =============================================================================

export type {
	CreatePathogenInput,
	CreateProjectInput,
	CreateStudyInput,
	EntityState,
	ListOptions,
	OrganisationCount,
	Pathogen,
	PathogenFilter,
	Privacy,
	Project,
	ProjectDetails,
	ProjectFilter,
	Study,
	StudyDetails,
	StudyFilter,
	UniquenessScope,
	UpdatePathogenInput,
	UpdateProjectInput,
	UpdateStudyInput,
} from "./types";

export type {
	EntityStore,
	PathogenRepository,
	ProjectRepository,
	ProjectSelector,
	ReadOptions,
	ReportRepository,
	Repositories,
	RowLock,
	RowSelector,
	SoftDeletableRepository,
	StudyRepository,
	StudySelector,
} from "./repositories";

// =============================================================================
// Persistence
// =============================================================================

export {
	createPostgresRepositories,
	isUuid,
	PostgresPathogenRepository,
	PostgresProjectRepository,
	PostgresReportRepository,
	PostgresStudyRepository,
	runMigrations,
	SCHEMA_PATH,
	translateDbError,
} from "./db";
export { PostgresEntityStore } from "./store";

// =============================================================================
// Services
// =============================================================================

export * from "./services";

// =============================================================================
// Validation
// =============================================================================

export type { ConfirmableOperation } from "./confirmation";
export { assertConfirmation, ConfirmationPhrases } from "./confirmation";
export {
	assertDateOrder,
	createPathogenSchema,
	createProjectSchema,
	createStudySchema,
	entityStateSchema,
	isoDateSchema,
	parseInput,
	privacySchema,
	SLUG_PATTERN,
	slugSchema,
	STUDY_ID_PATTERN,
	studyIdSchema,
	updatePathogenSchema,
	updateProjectSchema,
	updateStudySchema,
} from "./validation";
