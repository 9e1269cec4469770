import {
	ConflictError,
	type EntityKind,
	FolioError,
	InvalidReferenceError,
	StorageError,
	toError,
} from "@folio/common";
import { getPostgresErrorInfo, SqlState } from "@folio/storage";

const UNIQUE_CONSTRAINTS: Record<string, { entity: EntityKind; field: string; key: string }> = {
	pathogens_name_active_key: { entity: "pathogen", field: "name", key: "name" },
	projects_slug_active_key: { entity: "project", field: "slug", key: "slug" },
	studies_study_id_active_key: { entity: "study", field: "study_id", key: "studyId" },
};

const FOREIGN_KEYS: Record<string, { entity: EntityKind; key: string }> = {
	projects_pathogen_id_fkey: { entity: "pathogen", key: "pathogenId" },
	studies_project_id_fkey: { entity: "project", key: "projectId" },
};

/**
 * Value named by a constraint error's detail, e.g.
 * `Key (slug)=(covid-survey) already exists.`
 */
function keyValue(detail: string | undefined): string | undefined {
	return detail?.match(/^Key \([^)]*\)=\((.*)\) (?:already exists|is not present)/)?.[1];
}

function contextValue(context: Record<string, unknown>, key: string): string | undefined {
	const value = context[key];
	return typeof value === "string" ? value : undefined;
}

/**
 * Translate a database error into the domain taxonomy.
 *
 * @param context - Values of the statement, used to name the offending value;
 *   statements without one (restores, bulk updates) fall back to the detail
 */
export function translateDbError(error: unknown, context: Record<string, unknown> = {}): Error {
	if (error instanceof FolioError) {
		return error;
	}

	const cause = toError(error);
	const info = getPostgresErrorInfo(error);
	if (!info) {
		return new StorageError(`database call failed: ${cause.message}`, undefined, cause);
	}

	const constraint = info.constraint ?? "";

	if (info.code === SqlState.UNIQUE_VIOLATION) {
		const target = UNIQUE_CONSTRAINTS[constraint];
		if (target) {
			const value = contextValue(context, target.key) ?? keyValue(info.detail) ?? "";
			return new ConflictError(target.entity, target.field, value, cause);
		}
	}

	if (info.code === SqlState.FOREIGN_KEY_VIOLATION) {
		const target = FOREIGN_KEYS[constraint];
		if (target) {
			return new InvalidReferenceError(
				target.entity,
				contextValue(context, target.key) ?? keyValue(info.detail) ?? "",
				info.detail,
				cause,
			);
		}
	}

	return new StorageError(`database query failed: ${cause.message}`, info.code, cause);
}
