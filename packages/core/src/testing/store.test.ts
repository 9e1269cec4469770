import { ConflictError, InvalidReferenceError, StorageError } from "@folio/common";
import { describe, expect, it } from "vitest";
import { InMemoryEntityStore } from "./store";

describe("InMemoryEntityStore", () => {
	it("should roll back every write of a failed transaction", async () => {
		const store = new InMemoryEntityStore();

		await expect(
			store.transaction(async (repos) => {
				await repos.pathogens.insert({ name: "SARS-CoV-2" });
				throw new Error("abort");
			}),
		).rejects.toThrow("abort");

		expect(store.rows("pathogens")).toBe(0);
		expect(store.stats).toEqual({ committed: 0, rolledBack: 1 });
	});

	it("should undo in-place soft deletes on rollback", async () => {
		const store = new InMemoryEntityStore();
		const pathogen = await store.transaction((repos) => repos.pathogens.insert({ name: "Mpox" }));

		await expect(
			store.transaction(async (repos) => {
				await repos.pathogens.markDeleted([pathogen.id], new Date());
				throw new Error("abort");
			}),
		).rejects.toThrow("abort");

		expect(store.tables.pathogens.get(pathogen.id)?.deletedAt).toBeNull();
	});

	it("should run transactions one at a time", async () => {
		const store = new InMemoryEntityStore();
		const order: string[] = [];

		await Promise.all([
			store.transaction(async () => {
				order.push("a:start");
				await new Promise((resolve) => setTimeout(resolve, 5));
				order.push("a:end");
			}),
			store.transaction(async () => {
				order.push("b:start");
			}),
		]);

		expect(order).toEqual(["a:start", "a:end", "b:start"]);
	});

	it("should enforce uniqueness over live rows only", async () => {
		const store = new InMemoryEntityStore();

		await store.transaction(async (repos) => {
			const first = await repos.pathogens.insert({ name: "H5N1" });
			await expect(repos.pathogens.insert({ name: "H5N1" })).rejects.toBeInstanceOf(ConflictError);

			await repos.pathogens.markDeleted([first.id], new Date());
			await repos.pathogens.insert({ name: "H5N1" });
			await expect(repos.pathogens.restore([first.id])).rejects.toBeInstanceOf(ConflictError);
		});
	});

	it("should enforce foreign keys", async () => {
		const store = new InMemoryEntityStore();

		await store.transaction(async (repos) => {
			await expect(
				repos.projects.insert({
					slug: "orphan",
					name: "Orphan",
					organisationId: "o",
					userId: "u",
					pathogenId: "0b3c7f1e-5a1d-4c2e-9f00-1234567890ab",
				}),
			).rejects.toBeInstanceOf(InvalidReferenceError);

			const pathogen = await repos.pathogens.insert({ name: "Mpox" });
			await repos.projects.insert({
				slug: "mpox",
				name: "Mpox",
				organisationId: "o",
				userId: "u",
				pathogenId: pathogen.id,
			});
			await expect(repos.pathogens.hardDelete([pathogen.id])).rejects.toBeInstanceOf(
				InvalidReferenceError,
			);
		});
	});

	it("should cascade project hard deletes to studies", async () => {
		const store = new InMemoryEntityStore();

		await store.transaction(async (repos) => {
			const project = await repos.projects.insert({
				slug: "p1",
				name: "P1",
				organisationId: "o",
				userId: "u",
			});
			await repos.studies.insert({ studyId: "S1", name: "S1", projectId: project.id });

			expect(await repos.projects.hardDelete([project.id])).toBe(1);
		});

		expect(store.rows("studies")).toBe(0);
	});

	it("should reject inverted study dates like the check constraint", async () => {
		const store = new InMemoryEntityStore();

		await store.transaction(async (repos) => {
			const project = await repos.projects.insert({
				slug: "p1",
				name: "P1",
				organisationId: "o",
				userId: "u",
			});
			await expect(
				repos.studies.insert({
					studyId: "S1",
					name: "S1",
					projectId: project.id,
					startDate: "2024-05-01",
					endDate: "2024-04-01",
				}),
			).rejects.toBeInstanceOf(StorageError);
		});
	});

	it("should hide projects whose pathogen is deleted", async () => {
		const store = new InMemoryEntityStore();

		await store.transaction(async (repos) => {
			const pathogen = await repos.pathogens.insert({ name: "Mpox" });
			const project = await repos.projects.insert({
				slug: "mpox",
				name: "Mpox",
				organisationId: "o",
				userId: "u",
				pathogenId: pathogen.id,
			});
			await repos.studies.insert({ studyId: "S1", name: "S1", projectId: project.id });
			await repos.pathogens.markDeleted([pathogen.id], new Date());

			expect(await repos.projects.findById(project.id)).toBeNull();
			expect(await repos.projects.list()).toEqual([]);
			expect(await repos.projects.list({ state: "deleted" })).toHaveLength(1);
			expect(await repos.studies.list()).toEqual([]);
			expect(await repos.projects.count("active")).toBe(1);
			expect(await repos.reports.projectDetails()).toEqual([]);
		});
	});

	it("should throw a queued fault once", async () => {
		const store = new InMemoryEntityStore();
		store.failOn("pathogens", "insert", new Error("disk full"));

		await expect(
			store.transaction((repos) => repos.pathogens.insert({ name: "A" })),
		).rejects.toThrow("disk full");
		await store.transaction((repos) => repos.pathogens.insert({ name: "A" }));

		expect(store.rows("pathogens")).toBe(1);
	});

	it("should refresh updatedAt from the clock", async () => {
		let now = new Date("2024-01-01T00:00:00.000Z");
		const store = new InMemoryEntityStore({ clock: () => now });
		const pathogen = await store.transaction((repos) => repos.pathogens.insert({ name: "A" }));

		now = new Date("2024-01-02T00:00:00.000Z");
		const updated = await store.transaction((repos) =>
			repos.pathogens.update(pathogen.id, { description: "changed" }),
		);

		expect(updated?.createdAt).toEqual(new Date("2024-01-01T00:00:00.000Z"));
		expect(updated?.updatedAt).toEqual(new Date("2024-01-02T00:00:00.000Z"));
	});
});
