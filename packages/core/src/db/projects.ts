import type { Queryable } from "@folio/storage";
import type { ProjectRepository, ProjectSelector, ReadOptions } from "../repositories";
import type {
	CreateProjectInput,
	EntityState,
	OrganisationCount,
	Privacy,
	Project,
	ProjectFilter,
	UpdateProjectInput,
} from "../types";
import { SoftDeletableTable } from "./base";
import { isUuid, PROJECT_VISIBLE, QueryBuilder } from "./sql";

interface DbProject {
	id: string;
	slug: string;
	name: string;
	description: string | null;
	organisation_id: string;
	user_id: string;
	privacy: Privacy;
	pathogen_id: string | null;
	created_at: Date;
	updated_at: Date;
	deleted_at: Date | null;
}

interface DbOrganisationCount {
	organisation_id: string;
	total: string;
	public: string;
	private: string;
	active: string;
	deleted: string;
}

const COLUMNS =
	"id, slug, name, description, organisation_id, user_id, privacy, pathogen_id, created_at, updated_at, deleted_at";

/**
 * `active` is effective visibility; `deleted` is its complement.
 */
function visibility(state: EntityState): string | null {
	switch (state) {
		case "active":
			return PROJECT_VISIBLE;
		case "deleted":
			return `NOT (${PROJECT_VISIBLE})`;
		case "all":
			return null;
	}
}

/**
 * Repository for projects
 */
export class PostgresProjectRepository extends SoftDeletableTable implements ProjectRepository {
	constructor(db: Queryable) {
		super(db, "projects", "p");
	}

	async insert(input: CreateProjectInput): Promise<Project> {
		const row = await this.one<DbProject>(
			`
			INSERT INTO projects (slug, name, description, organisation_id, user_id, privacy, pathogen_id)
			VALUES ($1, $2, $3, $4, $5, $6, $7)
			RETURNING ${COLUMNS}
			`,
			[
				input.slug,
				input.name,
				input.description ?? null,
				input.organisationId,
				input.userId,
				input.privacy ?? "private",
				input.pathogenId ?? null,
			],
			{ slug: input.slug, pathogenId: input.pathogenId },
		);

		if (!row) {
			throw new Error("Failed to create project");
		}

		return this.mapFromDb(row);
	}

	async findById(id: string, options: ReadOptions = {}): Promise<Project | null> {
		if (!isUuid(id)) {
			return null;
		}
		return this.findOne("p.id", id, options);
	}

	findBySlug(slug: string, options: ReadOptions = {}): Promise<Project | null> {
		return this.findOne("p.slug", slug, options);
	}

	async list(filter: ProjectFilter = {}): Promise<Project[]> {
		const q = new QueryBuilder();
		const condition = visibility(filter.state ?? "active");
		if (condition) {
			q.where(condition);
		}
		if (filter.organisationId !== undefined) {
			q.where(`p.organisation_id = ${q.param(filter.organisationId)}`);
		}
		if (filter.userId !== undefined) {
			q.where(`p.user_id = ${q.param(filter.userId)}`);
		}
		if (filter.privacy !== undefined) {
			q.where(`p.privacy = ${q.param(filter.privacy)}`);
		}
		if (filter.pathogenId !== undefined) {
			if (!isUuid(filter.pathogenId)) {
				return [];
			}
			q.where(`p.pathogen_id = ${q.param(filter.pathogenId)}`);
		}

		const rows = await this.many<DbProject>(
			`SELECT ${COLUMNS} FROM projects p ${q.whereClause()} ORDER BY p.created_at, p.id ${q.page(filter.limit, filter.offset)}`,
			q.values,
		);
		return rows.map((row) => this.mapFromDb(row));
	}

	async update(id: string, input: UpdateProjectInput): Promise<Project | null> {
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
		if (input.organisationId !== undefined) {
			updates.push(`organisation_id = ${q.param(input.organisationId)}`);
		}
		if (input.privacy !== undefined) {
			updates.push(`privacy = ${q.param(input.privacy)}`);
		}
		if (input.pathogenId !== undefined) {
			updates.push(`pathogen_id = ${q.param(input.pathogenId)}`);
		}

		if (updates.length === 0) {
			return this.findById(id, { includeDeleted: true });
		}

		const row = await this.one<DbProject>(
			`UPDATE projects SET ${updates.join(", ")} WHERE id = ${q.param(id)} RETURNING ${COLUMNS}`,
			q.values,
			{ pathogenId: input.pathogenId },
		);
		return row ? this.mapFromDb(row) : null;
	}

	/**
	 * Project totals per organisation, by the row's own state.
	 */
	async countByOrganisation(): Promise<OrganisationCount[]> {
		const rows = await this.many<DbOrganisationCount>(
			`
			SELECT
				organisation_id,
				COUNT(*) AS total,
				COUNT(*) FILTER (WHERE privacy = 'public') AS public,
				COUNT(*) FILTER (WHERE privacy = 'private') AS private,
				COUNT(*) FILTER (WHERE deleted_at IS NULL) AS active,
				COUNT(*) FILTER (WHERE deleted_at IS NOT NULL) AS deleted
			FROM projects
			GROUP BY organisation_id
			ORDER BY organisation_id
			`,
			[],
		);

		return rows.map((row) => ({
			organisationId: row.organisation_id,
			totalProjects: Number(row.total),
			publicProjects: Number(row.public),
			privateProjects: Number(row.private),
			activeProjects: Number(row.active),
			deletedProjects: Number(row.deleted),
		}));
	}

	async selectIds(selector: ProjectSelector): Promise<string[]> {
		const q = new QueryBuilder();
		if (!this.applySelector(q, selector)) {
			return [];
		}
		if (selector.pathogenIds !== undefined && !this.whereIdIn(q, "pathogen_id", selector.pathogenIds)) {
			return [];
		}
		if (selector.organisationId !== undefined) {
			q.where(`p.organisation_id = ${q.param(selector.organisationId)}`);
		}
		if (selector.userId !== undefined) {
			q.where(`p.user_id = ${q.param(selector.userId)}`);
		}
		return this.selectIdsWhere(q, selector.lock);
	}

	private async findOne(column: string, value: string, options: ReadOptions): Promise<Project | null> {
		const q = new QueryBuilder();
		q.where(`${column} = ${q.param(value)}`);
		if (!options.includeDeleted) {
			q.where(PROJECT_VISIBLE);
		}

		const row = await this.one<DbProject>(
			`SELECT ${COLUMNS} FROM projects p ${q.whereClause()} ORDER BY p.deleted_at NULLS FIRST LIMIT 1${this.lockClause(options.lock)}`,
			q.values,
		);
		return row ? this.mapFromDb(row) : null;
	}

	private mapFromDb(row: DbProject): Project {
		return {
			id: row.id,
			slug: row.slug,
			name: row.name,
			description: row.description,
			organisationId: row.organisation_id,
			userId: row.user_id,
			privacy: row.privacy,
			pathogenId: row.pathogen_id,
			createdAt: row.created_at,
			updatedAt: row.updated_at,
			deletedAt: row.deleted_at,
		};
	}
}
