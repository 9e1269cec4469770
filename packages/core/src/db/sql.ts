/**
 * Small helpers for building parameterized SQL.
 *
 * @module @folio/core/db/sql
 */

import type { EntityState } from "../types";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Whether a value can be compared against a UUID column without a cast error.
 */
export function isUuid(value: string): boolean {
	return UUID_PATTERN.test(value);
}

/**
 * Accumulates positional parameters and WHERE conditions.
 *
 * @example
 * ```ts
 * const q = new QueryBuilder();
 * q.where(`organisation_id = ${q.param("org1")}`);
 * db.queryMany(`SELECT * FROM projects ${q.whereClause()}`, q.values);
 * ```
 */
export class QueryBuilder {
	readonly values: unknown[] = [];
	private readonly conditions: string[] = [];

	/** Register a value and return its placeholder */
	param(value: unknown): string {
		this.values.push(value);
		return `$${this.values.length}`;
	}

	where(condition: string): this {
		this.conditions.push(condition);
		return this;
	}

	whereClause(): string {
		return this.conditions.length > 0 ? `WHERE ${this.conditions.join(" AND ")}` : "";
	}

	/** LIMIT/OFFSET suffix; both optional */
	page(limit?: number, offset?: number): string {
		const parts: string[] = [];
		if (limit !== undefined) parts.push(`LIMIT ${this.param(limit)}`);
		if (offset !== undefined) parts.push(`OFFSET ${this.param(offset)}`);
		return parts.join(" ");
	}
}

/**
 * Condition on a row's own soft-delete state, or null for `all`.
 */
export function ownStateCondition(alias: string, state: EntityState): string | null {
	switch (state) {
		case "active":
			return `${alias}.deleted_at IS NULL`;
		case "deleted":
			return `${alias}.deleted_at IS NOT NULL`;
		case "all":
			return null;
	}
}

/** The project row and its pathogen (if any) are live */
export const PROJECT_VISIBLE = `p.deleted_at IS NULL AND NOT EXISTS (
	SELECT 1 FROM pathogens pa WHERE pa.id = p.pathogen_id AND pa.deleted_at IS NOT NULL
)`;

/** The study row, its project and the project's pathogen are live */
export const STUDY_VISIBLE = `s.deleted_at IS NULL AND EXISTS (
	SELECT 1 FROM projects p
	WHERE p.id = s.project_id AND ${PROJECT_VISIBLE}
)`;
