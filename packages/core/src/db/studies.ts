import type { Queryable } from "@folio/storage";
import type { ReadOptions, StudyRepository, StudySelector } from "../repositories";
import type {
	CreateStudyInput,
	EntityState,
	Study,
	StudyFilter,
	UpdateStudyInput,
} from "../types";
import { SoftDeletableTable } from "./base";
import { isUuid, QueryBuilder, STUDY_VISIBLE } from "./sql";

interface DbStudy {
	id: string;
	study_id: string;
	name: string;
	description: string | null;
	project_id: string;
	start_date: string | null;
	end_date: string | null;
	created_at: Date;
	updated_at: Date;
	deleted_at: Date | null;
}

// DATE columns come back as strings so no timezone shift applies
const COLUMNS = `id, study_id, name, description, project_id,
	to_char(start_date, 'YYYY-MM-DD') AS start_date,
	to_char(end_date, 'YYYY-MM-DD') AS end_date,
	created_at, updated_at, deleted_at`;

function visibility(state: EntityState): string | null {
	switch (state) {
		case "active":
			return STUDY_VISIBLE;
		case "deleted":
			return `NOT (${STUDY_VISIBLE})`;
		case "all":
			return null;
	}
}

/**
 * Repository for studies
 */
export class PostgresStudyRepository extends SoftDeletableTable implements StudyRepository {
	constructor(db: Queryable) {
		super(db, "studies", "s");
	}

	async insert(input: CreateStudyInput): Promise<Study> {
		const row = await this.one<DbStudy>(
			`
			INSERT INTO studies (study_id, name, description, project_id, start_date, end_date)
			VALUES ($1, $2, $3, $4, $5, $6)
			RETURNING ${COLUMNS}
			`,
			[
				input.studyId,
				input.name,
				input.description ?? null,
				input.projectId,
				input.startDate ?? null,
				input.endDate ?? null,
			],
			{ studyId: input.studyId, projectId: input.projectId },
		);

		if (!row) {
			throw new Error("Failed to create study");
		}

		return this.mapFromDb(row);
	}

	async findById(id: string, options: ReadOptions = {}): Promise<Study | null> {
		if (!isUuid(id)) {
			return null;
		}
		return this.findOne("s.id", id, options);
	}

	findByStudyId(studyId: string, options: ReadOptions = {}): Promise<Study | null> {
		return this.findOne("s.study_id", studyId, options);
	}

	async list(filter: StudyFilter = {}): Promise<Study[]> {
		const q = new QueryBuilder();
		const condition = visibility(filter.state ?? "active");
		if (condition) {
			q.where(condition);
		}
		if (filter.projectId !== undefined) {
			if (!isUuid(filter.projectId)) {
				return [];
			}
			q.where(`s.project_id = ${q.param(filter.projectId)}`);
		}
		if (filter.organisationId !== undefined) {
			q.where(
				`s.project_id IN (SELECT id FROM projects WHERE organisation_id = ${q.param(filter.organisationId)})`,
			);
		}
		if (filter.userId !== undefined) {
			q.where(`s.project_id IN (SELECT id FROM projects WHERE user_id = ${q.param(filter.userId)})`);
		}

		const rows = await this.many<DbStudy>(
			`SELECT ${COLUMNS} FROM studies s ${q.whereClause()} ORDER BY s.created_at, s.id ${q.page(filter.limit, filter.offset)}`,
			q.values,
		);
		return rows.map((row) => this.mapFromDb(row));
	}

	async update(id: string, input: UpdateStudyInput): Promise<Study | null> {
		if (!isUuid(id)) {
			return null;
		}

		const q = new QueryBuilder();
		const updates: string[] = [];

		if (input.name !== undefined) {
			updates.push(`name = ${q.param(input.name)}`);
		}
		if (input.description !== undefined) {
			updates.push(`description = ${q.param(input.description)}`);
		}
		if (input.projectId !== undefined) {
			updates.push(`project_id = ${q.param(input.projectId)}`);
		}
		if (input.startDate !== undefined) {
			updates.push(`start_date = ${q.param(input.startDate)}`);
		}
		if (input.endDate !== undefined) {
			updates.push(`end_date = ${q.param(input.endDate)}`);
		}

		if (updates.length === 0) {
			return this.findById(id, { includeDeleted: true });
		}

		const row = await this.one<DbStudy>(
			`UPDATE studies SET ${updates.join(", ")} WHERE id = ${q.param(id)} RETURNING ${COLUMNS}`,
			q.values,
			{ projectId: input.projectId },
		);
		return row ? this.mapFromDb(row) : null;
	}

	async selectIds(selector: StudySelector): Promise<string[]> {
		const q = new QueryBuilder();
		if (!this.applySelector(q, selector)) {
			return [];
		}
		if (selector.projectIds !== undefined && !this.whereIdIn(q, "project_id", selector.projectIds)) {
			return [];
		}
		return this.selectIdsWhere(q, selector.lock);
	}

	private async findOne(column: string, value: string, options: ReadOptions): Promise<Study | null> {
		const q = new QueryBuilder();
		q.where(`${column} = ${q.param(value)}`);
		if (!options.includeDeleted) {
			q.where(STUDY_VISIBLE);
		}

		const row = await this.one<DbStudy>(
			`SELECT ${COLUMNS} FROM studies s ${q.whereClause()} ORDER BY s.deleted_at NULLS FIRST LIMIT 1${this.lockClause(options.lock)}`,
			q.values,
		);
		return row ? this.mapFromDb(row) : null;
	}

	private mapFromDb(row: DbStudy): Study {
		return {
			id: row.id,
			studyId: row.study_id,
			name: row.name,
			description: row.description,
			projectId: row.project_id,
			startDate: row.start_date,
			endDate: row.end_date,
			createdAt: row.created_at,
			updatedAt: row.updated_at,
			deletedAt: row.deleted_at,
		};
	}
}
