import { ConflictError, InvalidReferenceError, NotFoundError, ValidationError } from "@folio/common";
import { describe, expect, it } from "vitest";
import { createTestContext, type TestContext } from "../testing";

async function project(ctx: TestContext, slug = "covid-survey", organisationId = "org1") {
	return ctx.services.projects.create({
		slug,
		name: slug,
		organisationId,
		userId: "u1",
	});
}

describe("StudyService", () => {
	it("should create a study under a visible project", async () => {
		const ctx = createTestContext();
		const parent = await project(ctx);

		const study = await ctx.services.studies.create({
			studyId: "CS-2024.01",
			name: "Baseline",
			projectId: parent.id,
			startDate: "2024-01-01",
			endDate: "2024-06-30",
		});

		expect(study).toMatchObject({
			studyId: "CS-2024.01",
			projectId: parent.id,
			startDate: "2024-01-01",
			endDate: "2024-06-30",
			description: null,
		});
		expect(ctx.log.messages()).toContain("Study created");
	});

	it("should reject an end date before the start date", async () => {
		const ctx = createTestContext();
		const parent = await project(ctx);

		await expect(
			ctx.services.studies.create({
				studyId: "S1",
				name: "Backwards",
				projectId: parent.id,
				startDate: "2024-06-30",
				endDate: "2024-01-01",
			}),
		).rejects.toThrow("start_date 2024-06-30 is after end_date 2024-01-01");
		expect(ctx.store.rows("studies")).toBe(0);
	});

	it("should reject dates that are not calendar dates", async () => {
		const ctx = createTestContext();
		const parent = await project(ctx);

		await expect(
			ctx.services.studies.create({
				studyId: "S1",
				name: "Leap",
				projectId: parent.id,
				startDate: "2023-02-29",
			}),
		).rejects.toBeInstanceOf(ValidationError);
	});

	it("should reject unknown and deleted projects", async () => {
		const ctx = createTestContext();
		const parent = await project(ctx);
		await ctx.services.lifecycle.softDelete({ kind: "project", id: parent.id });

		await expect(
			ctx.services.studies.create({ studyId: "S1", name: "Orphan", projectId: parent.id }),
		).rejects.toBeInstanceOf(InvalidReferenceError);
		await expect(
			ctx.services.studies.create({
				studyId: "S1",
				name: "Orphan",
				projectId: "0b3c7f1e-5a1d-4c2e-9f00-1234567890ab",
			}),
		).rejects.toBeInstanceOf(InvalidReferenceError);
	});

	it("should reject a duplicate study id", async () => {
		const ctx = createTestContext();
		const parent = await project(ctx);
		await ctx.services.studies.create({ studyId: "S1", name: "One", projectId: parent.id });

		await expect(
			ctx.services.studies.create({ studyId: "S1", name: "Two", projectId: parent.id }),
		).rejects.toThrow("study with study_id 'S1' already exists");
	});

	it("should filter lists by project and organisation", async () => {
		const ctx = createTestContext();
		const a = await project(ctx, "alpha", "org1");
		const b = await project(ctx, "beta", "org2");
		await ctx.services.studies.create({ studyId: "A1", name: "A1", projectId: a.id });
		await ctx.services.studies.create({ studyId: "B1", name: "B1", projectId: b.id });
		await ctx.services.studies.create({ studyId: "B2", name: "B2", projectId: b.id });

		const ids = async (filter: Parameters<typeof ctx.services.studies.list>[0]) =>
			(await ctx.services.studies.list(filter)).map((s) => s.studyId);

		expect(await ids({ projectId: a.id })).toEqual(["A1"]);
		expect(await ids({ organisationId: "org2" })).toEqual(["B1", "B2"]);
		expect(await ids({ userId: "u1" })).toEqual(["A1", "B1", "B2"]);
	});

	it("should hide studies whose project is deleted", async () => {
		const ctx = createTestContext();
		const parent = await project(ctx);
		const study = await ctx.services.studies.create({ studyId: "S1", name: "One", projectId: parent.id });
		await ctx.services.lifecycle.softDelete({ kind: "project", id: parent.id });

		expect(await ctx.services.studies.list()).toEqual([]);
		expect((await ctx.services.studies.list({ state: "deleted" })).map((s) => s.id)).toEqual([study.id]);
		await expect(ctx.services.studies.get(study.id)).rejects.toBeInstanceOf(NotFoundError);
	});

	describe("update", () => {
		it("should check the merged date range", async () => {
			const ctx = createTestContext();
			const parent = await project(ctx);
			const study = await ctx.services.studies.create({
				studyId: "S1",
				name: "One",
				projectId: parent.id,
				startDate: "2024-03-01",
			});

			await expect(
				ctx.services.studies.update(study.id, { endDate: "2024-02-01" }),
			).rejects.toBeInstanceOf(ValidationError);
			expect((await ctx.services.studies.update(study.id, { endDate: "2024-03-01" })).endDate).toBe(
				"2024-03-01",
			);
		});

		it("should move a study to another visible project", async () => {
			const ctx = createTestContext();
			const from = await project(ctx, "alpha");
			const to = await project(ctx, "beta");
			const study = await ctx.services.studies.create({ studyId: "S1", name: "One", projectId: from.id });

			expect((await ctx.services.studies.update(study.id, { projectId: to.id })).projectId).toBe(to.id);

			await ctx.services.lifecycle.softDelete({ kind: "project", id: from.id });
			await expect(
				ctx.services.studies.update(study.id, { projectId: from.id }),
			).rejects.toBeInstanceOf(InvalidReferenceError);
		});

		it("should not accept a new study id", async () => {
			const ctx = createTestContext();
			const parent = await project(ctx);
			const study = await ctx.services.studies.create({ studyId: "S1", name: "One", projectId: parent.id });
			const input = { name: "Renamed", studyId: "S2" };

			await expect(ctx.services.studies.update(study.id, input)).rejects.toBeInstanceOf(
				ValidationError,
			);
		});
	});

	it("should report a conflict error type for duplicates", async () => {
		const ctx = createTestContext();
		const parent = await project(ctx);
		await ctx.services.studies.create({ studyId: "S1", name: "One", projectId: parent.id });

		const error = await ctx.services.studies
			.create({ studyId: "S1", name: "Again", projectId: parent.id })
			.catch((e: unknown) => e);
		expect(error).toBeInstanceOf(ConflictError);
		expect(error).toMatchObject({ entity: "study", field: "study_id", value: "S1" });
	});
});
