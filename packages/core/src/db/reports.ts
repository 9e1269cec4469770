import type { ReportRepository } from "../repositories";
import type { Privacy, ProjectDetails, ProjectFilter, StudyDetails, StudyFilter } from "../types";
import { PostgresRepository } from "./base";
import { isUuid, QueryBuilder } from "./sql";

interface DbProjectDetails {
	id: string;
	slug: string;
	name: string;
	description: string | null;
	organisation_id: string;
	user_id: string;
	privacy: Privacy;
	pathogen_name: string | null;
	pathogen_scientific_name: string | null;
	study_count: number;
	created_at: Date;
	updated_at: Date;
}

interface DbStudyDetails {
	id: string;
	study_id: string;
	name: string;
	description: string | null;
	start_date: string | null;
	end_date: string | null;
	project_slug: string;
	project_name: string;
	pathogen_name: string | null;
	created_at: Date;
	updated_at: Date;
}

/**
 * Reads over the `project_details` and `study_details` views. The views
 * already exclude deleted and hidden rows, so `state` is not consulted.
 */
export class PostgresReportRepository extends PostgresRepository implements ReportRepository {
	async projectDetails(filter: ProjectFilter = {}): Promise<ProjectDetails[]> {
		const q = new QueryBuilder();
		if (filter.organisationId !== undefined) {
			q.where(`organisation_id = ${q.param(filter.organisationId)}`);
		}
		if (filter.userId !== undefined) {
			q.where(`user_id = ${q.param(filter.userId)}`);
		}
		if (filter.privacy !== undefined) {
			q.where(`privacy = ${q.param(filter.privacy)}`);
		}
		if (filter.pathogenId !== undefined) {
			if (!isUuid(filter.pathogenId)) {
				return [];
			}
			q.where(`pathogen_id = ${q.param(filter.pathogenId)}`);
		}

		const rows = await this.many<DbProjectDetails>(
			`
			SELECT id, slug, name, description, organisation_id, user_id, privacy,
				pathogen_name, pathogen_scientific_name, study_count, created_at, updated_at
			FROM project_details
			${q.whereClause()}
			ORDER BY created_at, id
			${q.page(filter.limit, filter.offset)}
			`,
			q.values,
		);

		return rows.map((row) => ({
			id: row.id,
			slug: row.slug,
			name: row.name,
			description: row.description,
			organisationId: row.organisation_id,
			userId: row.user_id,
			privacy: row.privacy,
			pathogenName: row.pathogen_name,
			pathogenScientificName: row.pathogen_scientific_name,
			studyCount: row.study_count,
			createdAt: row.created_at,
			updatedAt: row.updated_at,
		}));
	}

	async studyDetails(filter: StudyFilter = {}): Promise<StudyDetails[]> {
		const q = new QueryBuilder();
		if (filter.projectId !== undefined) {
			if (!isUuid(filter.projectId)) {
				return [];
			}
			q.where(`project_id = ${q.param(filter.projectId)}`);
		}
		if (filter.organisationId !== undefined) {
			q.where(`organisation_id = ${q.param(filter.organisationId)}`);
		}
		if (filter.userId !== undefined) {
			q.where(`user_id = ${q.param(filter.userId)}`);
		}

		const rows = await this.many<DbStudyDetails>(
			`
			SELECT id, study_id, name, description,
				to_char(start_date, 'YYYY-MM-DD') AS start_date,
				to_char(end_date, 'YYYY-MM-DD') AS end_date,
				project_slug, project_name, pathogen_name, created_at, updated_at
			FROM study_details
			${q.whereClause()}
			ORDER BY created_at, id
			${q.page(filter.limit, filter.offset)}
			`,
			q.values,
		);

		return rows.map((row) => ({
			id: row.id,
			studyId: row.study_id,
			name: row.name,
			description: row.description,
			startDate: row.start_date,
			endDate: row.end_date,
			projectSlug: row.project_slug,
			projectName: row.project_name,
			pathogenName: row.pathogen_name,
			createdAt: row.created_at,
			updatedAt: row.updated_at,
		}));
	}
}
