/**
 * Persistence contract for the entity store.
 *
 * @module @folio/core/repositories
 */

import type {
	CreatePathogenInput,
	CreateProjectInput,
	CreateStudyInput,
	EntityState,
	OrganisationCount,
	Pathogen,
	PathogenFilter,
	Project,
	ProjectDetails,
	ProjectFilter,
	Study,
	StudyDetails,
	StudyFilter,
	UpdatePathogenInput,
	UpdateProjectInput,
	UpdateStudyInput,
} from "./types";

/**
 * Row lock held until the transaction ends. `share` keeps a parent from
 * being soft-deleted while a child is inserted under it; `update` is what
 * a cascade takes before selecting descendants.
 */
export type RowLock = "share" | "update";

export interface ReadOptions {
	/** Also return soft-deleted rows and rows hidden by a deleted ancestor */
	includeDeleted?: boolean;
	lock?: RowLock;
}

/**
 * Row selection for cascades and purges. Criteria are ANDed; `state` looks
 * at the row's own `deleted_at` only. An empty id list selects nothing.
 */
export interface RowSelector {
	ids?: readonly string[];
	state?: EntityState;
	/** Exact soft-delete timestamp, used to restore one cascade */
	deletedAt?: Date;
	/** Lock the selected rows FOR UPDATE */
	lock?: boolean;
}

export interface ProjectSelector extends RowSelector {
	pathogenIds?: readonly string[];
	organisationId?: string;
	userId?: string;
}

export interface StudySelector extends RowSelector {
	projectIds?: readonly string[];
}

/**
 * Bulk state transitions shared by every entity table.
 */
export interface SoftDeletableRepository<S extends RowSelector> {
	selectIds(selector: S): Promise<string[]>;
	/** Only touches rows that are not yet deleted; returns the number marked */
	markDeleted(ids: readonly string[], at: Date): Promise<number>;
	/** Only touches deleted rows; returns the number restored */
	restore(ids: readonly string[]): Promise<number>;
	hardDelete(ids: readonly string[]): Promise<number>;
	deleteAll(): Promise<number>;
	/** Counts by the row's own state */
	count(state: EntityState): Promise<number>;
}

export interface PathogenRepository extends SoftDeletableRepository<RowSelector> {
	insert(input: CreatePathogenInput): Promise<Pathogen>;
	findById(id: string, options?: ReadOptions): Promise<Pathogen | null>;
	findByName(name: string, options?: ReadOptions): Promise<Pathogen | null>;
	list(filter?: PathogenFilter): Promise<Pathogen[]>;
	update(id: string, input: UpdatePathogenInput): Promise<Pathogen | null>;
}

export interface ProjectRepository extends SoftDeletableRepository<ProjectSelector> {
	insert(input: CreateProjectInput): Promise<Project>;
	findById(id: string, options?: ReadOptions): Promise<Project | null>;
	findBySlug(slug: string, options?: ReadOptions): Promise<Project | null>;
	list(filter?: ProjectFilter): Promise<Project[]>;
	update(id: string, input: UpdateProjectInput): Promise<Project | null>;
	countByOrganisation(): Promise<OrganisationCount[]>;
}

export interface StudyRepository extends SoftDeletableRepository<StudySelector> {
	insert(input: CreateStudyInput): Promise<Study>;
	findById(id: string, options?: ReadOptions): Promise<Study | null>;
	findByStudyId(studyId: string, options?: ReadOptions): Promise<Study | null>;
	list(filter?: StudyFilter): Promise<Study[]>;
	update(id: string, input: UpdateStudyInput): Promise<Study | null>;
}

/**
 * Read-only denormalized views. Both exclude soft-deleted rows.
 */
export interface ReportRepository {
	projectDetails(filter?: ProjectFilter): Promise<ProjectDetails[]>;
	studyDetails(filter?: StudyFilter): Promise<StudyDetails[]>;
}

export interface Repositories {
	pathogens: PathogenRepository;
	projects: ProjectRepository;
	studies: StudyRepository;
	reports: ReportRepository;
}

/**
 * Opens transactions over the repositories. Everything done through the
 * callback's repositories commits together or not at all.
 */
export interface EntityStore {
	transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T>;
}
