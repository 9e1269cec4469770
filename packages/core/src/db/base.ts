import type { Queryable, QueryResultRow } from "@folio/storage";
import type { RowLock, RowSelector } from "../repositories";
import type { EntityState } from "../types";
import { translateDbError } from "./errors";
import { isUuid, ownStateCondition, type QueryBuilder } from "./sql";

/**
 * Base for the PostgreSQL repositories: every statement goes through the
 * same error translation.
 */
export abstract class PostgresRepository {
	constructor(protected readonly db: Queryable) {}

	protected async one<T extends QueryResultRow>(
		text: string,
		params: unknown[],
		context?: Record<string, unknown>,
	): Promise<T | null> {
		try {
			return await this.db.queryOne<T>(text, params);
		} catch (error) {
			throw translateDbError(error, context);
		}
	}

	protected async many<T extends QueryResultRow>(
		text: string,
		params: unknown[],
		context?: Record<string, unknown>,
	): Promise<T[]> {
		try {
			return await this.db.queryMany<T>(text, params);
		} catch (error) {
			throw translateDbError(error, context);
		}
	}

	/** Run a statement and return its row count */
	protected async execute(text: string, params: unknown[]): Promise<number> {
		try {
			const result = await this.db.query(text, params);
			return result.rowCount ?? 0;
		} catch (error) {
			throw translateDbError(error);
		}
	}

	protected async countRows(text: string, params: unknown[]): Promise<number> {
		const row = await this.one<{ count: string }>(text, params);
		return Number(row?.count ?? 0);
	}
}

/**
 * Bulk soft-delete transitions over one table, keyed by UUID.
 */
export abstract class SoftDeletableTable extends PostgresRepository {
	constructor(
		db: Queryable,
		protected readonly table: string,
		protected readonly alias: string,
	) {
		super(db);
	}

	async markDeleted(ids: readonly string[], at: Date): Promise<number> {
		const valid = ids.filter(isUuid);
		if (valid.length === 0) {
			return 0;
		}
		return this.execute(
			`UPDATE ${this.table} SET deleted_at = $1 WHERE id = ANY($2::uuid[]) AND deleted_at IS NULL`,
			[at, valid],
		);
	}

	async restore(ids: readonly string[]): Promise<number> {
		const valid = ids.filter(isUuid);
		if (valid.length === 0) {
			return 0;
		}
		return this.execute(
			`UPDATE ${this.table} SET deleted_at = NULL WHERE id = ANY($1::uuid[]) AND deleted_at IS NOT NULL`,
			[valid],
		);
	}

	async hardDelete(ids: readonly string[]): Promise<number> {
		const valid = ids.filter(isUuid);
		if (valid.length === 0) {
			return 0;
		}
		return this.execute(`DELETE FROM ${this.table} WHERE id = ANY($1::uuid[])`, [valid]);
	}

	deleteAll(): Promise<number> {
		return this.execute(`DELETE FROM ${this.table}`, []);
	}

	count(state: EntityState): Promise<number> {
		const condition = ownStateCondition(this.alias, state);
		return this.countRows(
			`SELECT COUNT(*) AS count FROM ${this.table} ${this.alias}${condition ? ` WHERE ${condition}` : ""}`,
			[],
		);
	}

	/**
	 * Add the generic selector criteria to a query.
	 *
	 * @returns false when the selector cannot match anything
	 */
	protected applySelector(q: QueryBuilder, selector: RowSelector): boolean {
		if (selector.ids !== undefined && !this.whereIdIn(q, "id", selector.ids)) {
			return false;
		}
		const condition = ownStateCondition(this.alias, selector.state ?? "all");
		if (condition) {
			q.where(condition);
		}
		if (selector.deletedAt !== undefined) {
			q.where(`${this.alias}.deleted_at = ${q.param(selector.deletedAt)}`);
		}
		return true;
	}

	/** Locking suffix scoped to this table, so joined rows stay unlocked */
	protected lockClause(lock: RowLock | undefined): string {
		switch (lock) {
			case "share":
				return ` FOR SHARE OF ${this.alias}`;
			case "update":
				return ` FOR UPDATE OF ${this.alias}`;
			default:
				return "";
		}
	}

	/** `column = ANY(ids)`; false when no id is a UUID */
	protected whereIdIn(q: QueryBuilder, column: string, ids: readonly string[]): boolean {
		const valid = ids.filter(isUuid);
		if (valid.length === 0) {
			return false;
		}
		q.where(`${this.alias}.${column} = ANY(${q.param(valid)}::uuid[])`);
		return true;
	}

	protected async selectIdsWhere(q: QueryBuilder, lock = false): Promise<string[]> {
		const rows = await this.many<{ id: string }>(
			`SELECT ${this.alias}.id FROM ${this.table} ${this.alias} ${q.whereClause()} ORDER BY ${this.alias}.created_at, ${this.alias}.id${this.lockClause(lock ? "update" : undefined)}`,
			q.values,
		);
		return rows.map((row) => row.id);
	}
}
