import { beforeEach, describe, expect, it, vi } from "vitest";

const mockQuery = vi.fn();
const mockConnect = vi.fn();
const mockRelease = vi.fn();
const mockEnd = vi.fn();

const mockClient = {
	query: mockQuery,
	release: mockRelease,
};

vi.mock("pg", () => {
	class MockPool {
		connect = mockConnect;
		end = mockEnd;
		query = mockQuery;
	}

	return {
		default: {
			Pool: MockPool,
		},
	};
});

// Import after mocking
import { getPostgresErrorInfo, PostgresClient, SqlState } from "./postgres";

function rows<T>(data: T[]) {
	return { rows: data, rowCount: data.length, command: "SELECT", oid: 0, fields: [] };
}

describe("PostgresClient", () => {
	let client: PostgresClient;

	beforeEach(() => {
		vi.clearAllMocks();
		mockQuery.mockReset();
		mockConnect.mockResolvedValue(mockClient);
		mockQuery.mockResolvedValue(rows([]));

		client = new PostgresClient({ url: "postgresql://localhost:5432/folio" });
	});

	describe("connect", () => {
		it("should verify the connection with SELECT 1", async () => {
			await client.connect();

			expect(mockConnect).toHaveBeenCalledTimes(1);
			expect(mockQuery).toHaveBeenCalledWith("SELECT 1");
			expect(mockRelease).toHaveBeenCalledTimes(1);
			expect(client.isConnected()).toBe(true);
		});

		it("should be idempotent when already connected", async () => {
			await client.connect();
			mockConnect.mockClear();

			await client.connect();

			expect(mockConnect).not.toHaveBeenCalled();
		});

		it("should release the client even if the check query fails", async () => {
			mockQuery.mockRejectedValueOnce(new Error("Connection failed"));

			await expect(client.connect()).rejects.toThrow("Connection failed");

			expect(mockRelease).toHaveBeenCalledTimes(1);
			expect(client.isConnected()).toBe(false);
		});
	});

	describe("disconnect", () => {
		it("should end the pool once", async () => {
			await client.connect();
			await client.disconnect();
			await client.disconnect();

			expect(mockEnd).toHaveBeenCalledTimes(1);
			expect(client.isConnected()).toBe(false);
		});
	});

	describe("queries", () => {
		it("should pass parameters through", async () => {
			await client.connect();
			mockQuery.mockResolvedValueOnce(rows([{ id: "p-1" }]));

			const result = await client.query("SELECT id FROM projects WHERE slug = $1", ["s1"]);

			expect(mockQuery).toHaveBeenCalledWith("SELECT id FROM projects WHERE slug = $1", ["s1"]);
			expect(result.rows).toEqual([{ id: "p-1" }]);
		});

		it("should return the first row or null", async () => {
			await client.connect();
			mockQuery.mockResolvedValueOnce(rows([{ id: "a" }, { id: "b" }]));
			mockQuery.mockResolvedValueOnce(rows([]));

			expect(await client.queryOne("SELECT 1")).toEqual({ id: "a" });
			expect(await client.queryOne("SELECT 1")).toBeNull();
		});

		it("should return all rows", async () => {
			await client.connect();
			mockQuery.mockResolvedValueOnce(rows([{ id: "a" }, { id: "b" }]));

			expect(await client.queryMany("SELECT 1")).toEqual([{ id: "a" }, { id: "b" }]);
		});

		it("should throw when not connected", async () => {
			await expect(client.query("SELECT 1")).rejects.toThrow("PostgresClient is not connected");
		});
	});

	describe("transaction", () => {
		it("should commit and run statements on the checked-out client", async () => {
			await client.connect();
			mockQuery
				.mockResolvedValueOnce(rows([])) // BEGIN
				.mockResolvedValueOnce(rows([{ id: "p-1" }])) // INSERT
				.mockResolvedValueOnce(rows([])); // COMMIT

			const id = await client.transaction(async (session) => {
				const row = await session.queryOne<{ id: string }>(
					"INSERT INTO projects (slug) VALUES ($1) RETURNING id",
					["s1"],
				);
				return row?.id;
			});

			expect(id).toBe("p-1");
			expect(mockQuery.mock.calls.map((call) => call[0])).toEqual([
				"BEGIN",
				"INSERT INTO projects (slug) VALUES ($1) RETURNING id",
				"COMMIT",
			]);
			expect(mockRelease).toHaveBeenCalledTimes(1);
		});

		it("should roll back and rethrow on error", async () => {
			await client.connect();

			await expect(
				client.transaction(async () => {
					throw new Error("saga failed");
				}),
			).rejects.toThrow("saga failed");

			expect(mockQuery).toHaveBeenCalledWith("BEGIN");
			expect(mockQuery).toHaveBeenCalledWith("ROLLBACK");
			expect(mockQuery).not.toHaveBeenCalledWith("COMMIT");
			expect(mockRelease).toHaveBeenCalledTimes(1);
		});

		it("should expose queryMany on the session", async () => {
			await client.connect();
			mockQuery
				.mockResolvedValueOnce(rows([]))
				.mockResolvedValueOnce(rows([{ id: "a" }]))
				.mockResolvedValueOnce(rows([]));

			const result = await client.transaction((session) => session.queryMany("SELECT id"));

			expect(result).toEqual([{ id: "a" }]);
		});

		it("should throw when not connected", async () => {
			await expect(client.transaction(async () => "x")).rejects.toThrow(
				"PostgresClient is not connected",
			);
		});
	});

	describe("healthCheck", () => {
		it("should return false when not connected", async () => {
			expect(await client.healthCheck()).toBe(false);
		});

		it("should return true when the check query succeeds", async () => {
			await client.connect();

			expect(await client.healthCheck()).toBe(true);
		});

		it("should mark the client disconnected on failure", async () => {
			await client.connect();
			mockQuery.mockRejectedValueOnce(new Error("Connection lost"));

			expect(await client.healthCheck()).toBe(false);
			expect(client.isConnected()).toBe(false);
			expect(mockRelease).toHaveBeenCalledTimes(2);
		});
	});
});

describe("getPostgresErrorInfo", () => {
	it("should extract SQLSTATE and constraint", () => {
		const error = Object.assign(new Error("duplicate key"), {
			code: SqlState.UNIQUE_VIOLATION,
			constraint: "projects_slug_active_key",
			detail: "Key (slug)=(s1) already exists.",
		});

		expect(getPostgresErrorInfo(error)).toEqual({
			code: "23505",
			constraint: "projects_slug_active_key",
			detail: "Key (slug)=(s1) already exists.",
		});
	});

	it("should ignore errors without a SQLSTATE", () => {
		expect(getPostgresErrorInfo(new Error("boom"))).toBeUndefined();
		expect(getPostgresErrorInfo(Object.assign(new Error("x"), { code: "ECONNREFUSED" }))).toBeUndefined();
		expect(getPostgresErrorInfo("23505")).toBeUndefined();
	});
});
