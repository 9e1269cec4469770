import {
	ConflictError,
	InvalidReferenceError,
	NotFoundError,
	StorageError,
} from "@folio/common";
import { describe, expect, it } from "vitest";
import { translateDbError } from "./errors";

function pgError(code: string, constraint?: string, detail?: string): Error {
	return Object.assign(new Error(`pg error ${code}`), { code, constraint, detail });
}

describe("translateDbError", () => {
	it("should map unique violations on known indexes to ConflictError", () => {
		const error = translateDbError(pgError("23505", "projects_slug_active_key"), {
			slug: "covid-survey",
		});

		expect(error).toBeInstanceOf(ConflictError);
		expect(error.message).toBe("project with slug 'covid-survey' already exists");
	});

	it("should map study_id collisions", () => {
		const error = translateDbError(pgError("23505", "studies_study_id_active_key"), {
			studyId: "STUDY-1",
		});

		expect(error).toBeInstanceOf(ConflictError);
		expect(error.message).toBe("study with study_id 'STUDY-1' already exists");
	});

	it("should map foreign key violations to InvalidReferenceError", () => {
		const error = translateDbError(
			pgError("23503", "studies_project_id_fkey", "Key (project_id) is not present"),
			{ projectId: "0b3c7f1e-5a1d-4c2e-9f00-1234567890ab" },
		);

		expect(error).toBeInstanceOf(InvalidReferenceError);
		expect(error).toMatchObject({
			entity: "project",
			referenceId: "0b3c7f1e-5a1d-4c2e-9f00-1234567890ab",
			message: "Key (project_id) is not present",
		});
	});

	it("should name the value from the detail when the statement has no context", () => {
		const error = translateDbError(
			pgError("23505", "projects_slug_active_key", "Key (slug)=(covid-survey) already exists."),
		);

		expect(error).toBeInstanceOf(ConflictError);
		expect(error).toMatchObject({ field: "slug", value: "covid-survey" });
		expect(error.message).toBe("project with slug 'covid-survey' already exists");
	});

	it("should read the missing reference from the detail", () => {
		const error = translateDbError(
			pgError(
				"23503",
				"projects_pathogen_id_fkey",
				'Key (pathogen_id)=(7d5e4b2a-1c3f-4e6d-8a9b-0c1d2e3f4a5b) is not present in table "pathogens".',
			),
		);

		expect(error).toMatchObject({
			entity: "pathogen",
			referenceId: "7d5e4b2a-1c3f-4e6d-8a9b-0c1d2e3f4a5b",
		});
	});

	it("should keep the SQLSTATE of other database errors", () => {
		const error = translateDbError(pgError("23514", "studies_dates_check"));

		expect(error).toBeInstanceOf(StorageError);
		expect(error).toMatchObject({ sqlState: "23514", code: "STORAGE_QUERY_FAILED" });
	});

	it("should pass domain errors through", () => {
		const original = new NotFoundError("project", "x");
		expect(translateDbError(original)).toBe(original);
	});

	it("should wrap anything else as a storage error", () => {
		const error = translateDbError(new Error("connection refused"));

		expect(error).toBeInstanceOf(StorageError);
		expect(error.message).toBe("database call failed: connection refused");
	});
});
