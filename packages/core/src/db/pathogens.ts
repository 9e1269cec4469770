import type { Queryable } from "@folio/storage";
import type { PathogenRepository, ReadOptions, RowSelector } from "../repositories";
import type {
	CreatePathogenInput,
	EntityState,
	Pathogen,
	PathogenFilter,
	UpdatePathogenInput,
} from "../types";
import { SoftDeletableTable } from "./base";
import { isUuid, QueryBuilder } from "./sql";

interface DbPathogen {
	id: string;
	name: string;
	scientific_name: string | null;
	description: string | null;
	taxonomy_id: number | null;
	created_at: Date;
	updated_at: Date;
	deleted_at: Date | null;
}

const COLUMNS = "id, name, scientific_name, description, taxonomy_id, created_at, updated_at, deleted_at";

function visibility(state: EntityState): string | null {
	switch (state) {
		case "active":
			return "pa.deleted_at IS NULL";
		case "deleted":
			return "pa.deleted_at IS NOT NULL";
		case "all":
			return null;
	}
}

/**
 * Repository for pathogens
 */
export class PostgresPathogenRepository extends SoftDeletableTable implements PathogenRepository {
	constructor(db: Queryable) {
		super(db, "pathogens", "pa");
	}

	async insert(input: CreatePathogenInput): Promise<Pathogen> {
		const row = await this.one<DbPathogen>(
			`
			INSERT INTO pathogens (name, scientific_name, description, taxonomy_id)
			VALUES ($1, $2, $3, $4)
			RETURNING ${COLUMNS}
			`,
			[input.name, input.scientificName ?? null, input.description ?? null, input.taxonomyId ?? null],
			{ name: input.name },
		);

		if (!row) {
			throw new Error("Failed to create pathogen");
		}

		return this.mapFromDb(row);
	}

	async findById(id: string, options: ReadOptions = {}): Promise<Pathogen | null> {
		if (!isUuid(id)) {
			return null;
		}
		return this.findOne("pa.id", id, options);
	}

	findByName(name: string, options: ReadOptions = {}): Promise<Pathogen | null> {
		return this.findOne("pa.name", name, options);
	}

	async list(filter: PathogenFilter = {}): Promise<Pathogen[]> {
		const q = new QueryBuilder();
		const condition = visibility(filter.state ?? "active");
		if (condition) {
			q.where(condition);
		}

		const rows = await this.many<DbPathogen>(
			`SELECT ${COLUMNS} FROM pathogens pa ${q.whereClause()} ORDER BY pa.created_at, pa.id ${q.page(filter.limit, filter.offset)}`,
			q.values,
		);
		return rows.map((row) => this.mapFromDb(row));
	}

	async update(id: string, input: UpdatePathogenInput): Promise<Pathogen | null> {
		if (!isUuid(id)) {
			return null;
		}

		const q = new QueryBuilder();
		const updates: string[] = [];

		if (input.name !== undefined) {
			updates.push(`name = ${q.param(input.name)}`);
		}
		if (input.scientificName !== undefined) {
			updates.push(`scientific_name = ${q.param(input.scientificName)}`);
		}
		if (input.description !== undefined) {
			updates.push(`description = ${q.param(input.description)}`);
		}
		if (input.taxonomyId !== undefined) {
			updates.push(`taxonomy_id = ${q.param(input.taxonomyId)}`);
		}

		if (updates.length === 0) {
			return this.findById(id, { includeDeleted: true });
		}

		const row = await this.one<DbPathogen>(
			`UPDATE pathogens SET ${updates.join(", ")} WHERE id = ${q.param(id)} RETURNING ${COLUMNS}`,
			q.values,
			{ name: input.name },
		);
		return row ? this.mapFromDb(row) : null;
	}

	async selectIds(selector: RowSelector): Promise<string[]> {
		const q = new QueryBuilder();
		if (!this.applySelector(q, selector)) {
			return [];
		}
		return this.selectIdsWhere(q, selector.lock);
	}

	private async findOne(
		column: string,
		value: string,
		options: ReadOptions,
	): Promise<Pathogen | null> {
		const q = new QueryBuilder();
		q.where(`${column} = ${q.param(value)}`);
		if (!options.includeDeleted) {
			q.where("pa.deleted_at IS NULL");
		}

		const row = await this.one<DbPathogen>(
			`SELECT ${COLUMNS} FROM pathogens pa ${q.whereClause()} ORDER BY pa.deleted_at NULLS FIRST LIMIT 1${this.lockClause(options.lock)}`,
			q.values,
		);
		return row ? this.mapFromDb(row) : null;
	}

	private mapFromDb(row: DbPathogen): Pathogen {
		return {
			id: row.id,
			name: row.name,
			scientificName: row.scientific_name,
			description: row.description,
			taxonomyId: row.taxonomy_id,
			createdAt: row.created_at,
			updatedAt: row.updated_at,
			deletedAt: row.deleted_at,
		};
	}
}
