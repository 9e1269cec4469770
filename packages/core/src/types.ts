/**
 * Domain types for pathogens, projects and studies.
 *
 * @module @folio/core/types
 */

export type Privacy = "public" | "private";

/**
 * Row state filter. `active` on default reads means effectively visible:
 * the row and every ancestor are live.
 */
export type EntityState = "active" | "deleted" | "all";

/**
 * Whether names held by soft-deleted rows block reuse.
 */
export type UniquenessScope = "all-rows" | "active-rows";

export interface Pathogen {
	id: string;
	name: string;
	scientificName: string | null;
	description: string | null;
	taxonomyId: number | null;
	createdAt: Date;
	updatedAt: Date;
	deletedAt: Date | null;
}

export interface Project {
	id: string;
	/** Immutable, URL-safe */
	slug: string;
	name: string;
	description: string | null;
	organisationId: string;
	/** Creator, as the identity provider's user id */
	userId: string;
	privacy: Privacy;
	pathogenId: string | null;
	createdAt: Date;
	updatedAt: Date;
	deletedAt: Date | null;
}

export interface Study {
	id: string;
	studyId: string;
	name: string;
	description: string | null;
	projectId: string;
	/** ISO date (YYYY-MM-DD) */
	startDate: string | null;
	endDate: string | null;
	createdAt: Date;
	updatedAt: Date;
	deletedAt: Date | null;
}

// =============================================================================
// Inputs
// =============================================================================

export interface CreatePathogenInput {
	name: string;
	scientificName?: string | null;
	description?: string | null;
	taxonomyId?: number | null;
}

export interface UpdatePathogenInput {
	name?: string;
	scientificName?: string | null;
	description?: string | null;
	taxonomyId?: number | null;
}

export interface CreateProjectInput {
	slug: string;
	name: string;
	description?: string | null;
	organisationId: string;
	userId: string;
	privacy?: Privacy;
	pathogenId?: string | null;
}

export interface UpdateProjectInput {
	name?: string;
	description?: string | null;
	organisationId?: string;
	privacy?: Privacy;
	pathogenId?: string | null;
}

export interface CreateStudyInput {
	studyId: string;
	name: string;
	description?: string | null;
	projectId: string;
	startDate?: string | null;
	endDate?: string | null;
}

export interface UpdateStudyInput {
	name?: string;
	description?: string | null;
	projectId?: string;
	startDate?: string | null;
	endDate?: string | null;
}

// =============================================================================
// Filters
// =============================================================================

export interface ListOptions {
	/** Default: active */
	state?: EntityState;
	limit?: number;
	offset?: number;
}

export type PathogenFilter = ListOptions;

export interface ProjectFilter extends ListOptions {
	organisationId?: string;
	userId?: string;
	privacy?: Privacy;
	pathogenId?: string;
}

export interface StudyFilter extends ListOptions {
	projectId?: string;
	organisationId?: string;
	userId?: string;
}

// =============================================================================
// Reports
// =============================================================================

export interface ProjectDetails {
	id: string;
	slug: string;
	name: string;
	description: string | null;
	organisationId: string;
	userId: string;
	privacy: Privacy;
	pathogenName: string | null;
	pathogenScientificName: string | null;
	/** Active studies only */
	studyCount: number;
	createdAt: Date;
	updatedAt: Date;
}

export interface StudyDetails {
	id: string;
	studyId: string;
	name: string;
	description: string | null;
	startDate: string | null;
	endDate: string | null;
	projectSlug: string;
	projectName: string;
	pathogenName: string | null;
	createdAt: Date;
	updatedAt: Date;
}

export interface OrganisationCount {
	organisationId: string;
	totalProjects: number;
	publicProjects: number;
	privateProjects: number;
	activeProjects: number;
	deletedProjects: number;
}
