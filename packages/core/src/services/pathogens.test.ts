import { ConflictError, NotFoundError, ValidationError } from "@folio/common";
import { describe, expect, it } from "vitest";
import { createTestContext } from "../testing";

describe("PathogenService", () => {
	it("should create a pathogen with optional fields defaulting to null", async () => {
		const { services, log } = createTestContext();

		const pathogen = await services.pathogens.create({ name: "Influenza A" });

		expect(pathogen).toMatchObject({
			name: "Influenza A",
			scientificName: null,
			description: null,
			taxonomyId: null,
			deletedAt: null,
		});
		expect(log.messages()).toContain("Pathogen created");
	});

	it("should reject a duplicate name", async () => {
		const { services } = createTestContext();
		await services.pathogens.create({ name: "Influenza A" });

		await expect(services.pathogens.create({ name: "Influenza A" })).rejects.toThrow(
			"pathogen with name 'Influenza A' already exists",
		);
	});

	it("should keep deleted names reserved unless uniqueness covers active rows only", async () => {
		const strict = createTestContext();
		const first = await strict.services.pathogens.create({ name: "Measles" });
		await strict.services.lifecycle.softDelete({ kind: "pathogen", id: first.id });
		await expect(strict.services.pathogens.create({ name: "Measles" })).rejects.toBeInstanceOf(
			ConflictError,
		);

		const relaxed = createTestContext({ uniquenessScope: "active-rows" });
		const old = await relaxed.services.pathogens.create({ name: "Measles" });
		await relaxed.services.lifecycle.softDelete({ kind: "pathogen", id: old.id });
		const fresh = await relaxed.services.pathogens.create({ name: "Measles" });
		expect(fresh.id).not.toBe(old.id);
	});

	it("should validate input", async () => {
		const { services } = createTestContext();

		await expect(services.pathogens.create({ name: "" })).rejects.toBeInstanceOf(ValidationError);
		await expect(
			services.pathogens.create({ name: "Mumps", taxonomyId: -1 }),
		).rejects.toBeInstanceOf(ValidationError);
	});

	it("should hide deleted pathogens from default reads", async () => {
		const ctx = createTestContext();
		const kept = await ctx.services.pathogens.create({ name: "Kept" });
		const gone = await ctx.services.pathogens.create({ name: "Gone" });
		await ctx.services.lifecycle.softDelete({ kind: "pathogen", id: gone.id });

		expect((await ctx.services.pathogens.list()).map((p) => p.id)).toEqual([kept.id]);
		expect((await ctx.services.pathogens.list({ state: "deleted" })).map((p) => p.id)).toEqual([
			gone.id,
		]);
		expect(await ctx.services.pathogens.list({ state: "all" })).toHaveLength(2);
		await expect(ctx.services.pathogens.get(gone.id)).rejects.toBeInstanceOf(NotFoundError);
		expect((await ctx.services.pathogens.get(gone.id, { includeDeleted: true })).deletedAt).not.toBeNull();
	});

	it("should page lists", async () => {
		const { services } = createTestContext();
		for (const name of ["A", "B", "C"]) {
			await services.pathogens.create({ name });
		}

		expect((await services.pathogens.list({ limit: 1, offset: 1 })).map((p) => p.name)).toEqual(["B"]);
	});

	describe("update", () => {
		it("should change fields and refresh updatedAt", async () => {
			const ctx = createTestContext();
			const pathogen = await ctx.services.pathogens.create({ name: "Ebola" });
			const later = ctx.tick();

			const updated = await ctx.services.pathogens.update(pathogen.id, {
				scientificName: "Orthoebolavirus zairense",
				taxonomyId: 3052462,
			});

			expect(updated).toMatchObject({
				name: "Ebola",
				scientificName: "Orthoebolavirus zairense",
				taxonomyId: 3052462,
				updatedAt: later,
			});
		});

		it("should reject a name held by another pathogen", async () => {
			const { services } = createTestContext();
			await services.pathogens.create({ name: "Ebola" });
			const other = await services.pathogens.create({ name: "Marburg" });

			await expect(services.pathogens.update(other.id, { name: "Ebola" })).rejects.toBeInstanceOf(
				ConflictError,
			);
		});

		it("should allow keeping the current name", async () => {
			const { services } = createTestContext();
			const pathogen = await services.pathogens.create({ name: "Ebola" });

			expect((await services.pathogens.update(pathogen.id, { name: "Ebola" })).name).toBe("Ebola");
		});

		it("should not update a deleted pathogen", async () => {
			const ctx = createTestContext();
			const pathogen = await ctx.services.pathogens.create({ name: "Ebola" });
			await ctx.services.lifecycle.softDelete({ kind: "pathogen", id: pathogen.id });

			await expect(
				ctx.services.pathogens.update(pathogen.id, { description: "x" }),
			).rejects.toBeInstanceOf(NotFoundError);
		});
	});
});
