import { ConflictError, StorageError } from "@folio/common";
import { PostgresClient } from "@folio/storage";
import { beforeEach, describe, expect, it, vi } from "vitest";

const mockQuery = vi.fn();
const mockConnect = vi.fn();
const mockRelease = vi.fn();

vi.mock("pg", () => {
	class MockPool {
		connect = mockConnect;
		end = vi.fn();
		query = mockQuery;
	}

	return {
		default: {
			Pool: MockPool,
		},
	};
});

import { PostgresEntityStore } from "./store";

function rows<T>(data: T[]) {
	return { rows: data, rowCount: data.length, command: "SELECT", oid: 0, fields: [] };
}

describe("PostgresEntityStore", () => {
	let client: PostgresClient;

	beforeEach(async () => {
		vi.clearAllMocks();
		mockQuery.mockReset();
		mockConnect.mockResolvedValue({ query: mockQuery, release: mockRelease });
		mockQuery.mockResolvedValue(rows([]));

		client = new PostgresClient({ url: "postgresql://localhost:5432/folio" });
		await client.connect();
		mockQuery.mockClear();
	});

	it("should run repository calls inside BEGIN/COMMIT", async () => {
		const store = new PostgresEntityStore(client);
		mockQuery.mockImplementation(async (text: string) =>
			text.startsWith("SELECT COUNT") ? rows([{ count: "2" }]) : rows([]),
		);

		const count = await store.transaction((repos) => repos.projects.count("all"));

		expect(count).toBe(2);
		expect(mockQuery.mock.calls.map((call) => call[0])).toEqual([
			"BEGIN",
			"SELECT COUNT(*) AS count FROM projects p",
			"COMMIT",
		]);
		expect(mockRelease).toHaveBeenCalledTimes(1);
	});

	it("should roll back and translate a unique violation", async () => {
		const store = new PostgresEntityStore(client);
		mockQuery.mockImplementation(async (text: string) => {
			if (text.includes("INSERT INTO projects")) {
				throw Object.assign(new Error("duplicate key"), {
					code: "23505",
					constraint: "projects_slug_active_key",
				});
			}
			return rows([]);
		});

		const error = await store
			.transaction((repos) =>
				repos.projects.insert({
					slug: "covid-survey",
					name: "Covid Survey",
					organisationId: "org1",
					userId: "u1",
				}),
			)
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ConflictError);
		expect(mockQuery.mock.calls.map((call) => call[0])).toContain("ROLLBACK");
	});

	it("should wrap connection failures as storage errors", async () => {
		const store = new PostgresEntityStore(client);
		mockConnect.mockRejectedValueOnce(new Error("too many clients"));

		await expect(store.transaction(async () => 1)).rejects.toBeInstanceOf(StorageError);
	});
});
