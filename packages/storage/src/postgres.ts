import pg from "pg";

const { Pool } = pg;

export interface PostgresClientOptions {
	url: string;
	/** Pool size (default: 20) */
	max?: number;
}

/**
 * Anything that can run parameterized SQL: the pooled client itself, or a
 * session bound to one open transaction.
 */
export interface Queryable {
	query<T extends pg.QueryResultRow = pg.QueryResultRow>(
		text: string,
		params?: unknown[],
	): Promise<pg.QueryResult<T>>;
	queryOne<T extends pg.QueryResultRow = pg.QueryResultRow>(
		text: string,
		params?: unknown[],
	): Promise<T | null>;
	queryMany<T extends pg.QueryResultRow = pg.QueryResultRow>(
		text: string,
		params?: unknown[],
	): Promise<T[]>;
}

/**
 * Fields of a server-side error that callers translate into domain errors.
 */
export interface PostgresErrorInfo {
	/** SQLSTATE, e.g. 23505 for unique_violation */
	code: string;
	constraint?: string;
	detail?: string;
}

export const SqlState = {
	UNIQUE_VIOLATION: "23505",
	FOREIGN_KEY_VIOLATION: "23503",
	NOT_NULL_VIOLATION: "23502",
	CHECK_VIOLATION: "23514",
} as const;

/**
 * Extract SQLSTATE and constraint from an error thrown by pg, if it is one.
 */
export function getPostgresErrorInfo(error: unknown): PostgresErrorInfo | undefined {
	if (!(error instanceof Error) || !("code" in error) || typeof error.code !== "string") {
		return undefined;
	}
	if (!/^[0-9A-Z]{5}$/.test(error.code)) {
		return undefined;
	}
	return {
		code: error.code,
		constraint:
			"constraint" in error && typeof error.constraint === "string" ? error.constraint : undefined,
		detail: "detail" in error && typeof error.detail === "string" ? error.detail : undefined,
	};
}

/**
 * Session bound to a single checked-out connection.
 */
class PostgresSession implements Queryable {
	constructor(private readonly client: pg.PoolClient) {}

	query<T extends pg.QueryResultRow = pg.QueryResultRow>(
		text: string,
		params?: unknown[],
	): Promise<pg.QueryResult<T>> {
		return this.client.query<T>(text, params);
	}

	async queryOne<T extends pg.QueryResultRow = pg.QueryResultRow>(
		text: string,
		params?: unknown[],
	): Promise<T | null> {
		const result = await this.query<T>(text, params);
		return result.rows[0] ?? null;
	}

	async queryMany<T extends pg.QueryResultRow = pg.QueryResultRow>(
		text: string,
		params?: unknown[],
	): Promise<T[]> {
		const result = await this.query<T>(text, params);
		return result.rows;
	}
}

/**
 * PostgreSQL client wrapper
 *
 * Provides connection pooling, query execution and transactions.
 */
export class PostgresClient implements Queryable {
	private pool: pg.Pool;
	private connected = false;

	constructor(options: PostgresClientOptions) {
		this.pool = new Pool({
			connectionString: options.url,
			max: options.max ?? 20,
			idleTimeoutMillis: 30000,
			connectionTimeoutMillis: 5000,
		});
	}

	/**
	 * Connect to the database
	 */
	async connect(): Promise<void> {
		if (this.connected) {
			return;
		}

		const client = await this.pool.connect();
		try {
			await client.query("SELECT 1");
			this.connected = true;
		} finally {
			client.release();
		}
	}

	/**
	 * Disconnect from the database
	 */
	async disconnect(): Promise<void> {
		if (!this.connected) {
			return;
		}

		await this.pool.end();
		this.connected = false;
	}

	/**
	 * Execute a query
	 */
	async query<T extends pg.QueryResultRow = pg.QueryResultRow>(
		text: string,
		params?: unknown[],
	): Promise<pg.QueryResult<T>> {
		if (!this.connected) {
			throw new Error("PostgresClient is not connected");
		}

		return this.pool.query<T>(text, params);
	}

	/**
	 * Execute a query and return a single row
	 */
	async queryOne<T extends pg.QueryResultRow = pg.QueryResultRow>(
		text: string,
		params?: unknown[],
	): Promise<T | null> {
		const result = await this.query<T>(text, params);
		return result.rows[0] ?? null;
	}

	/**
	 * Execute a query and return all rows
	 */
	async queryMany<T extends pg.QueryResultRow = pg.QueryResultRow>(
		text: string,
		params?: unknown[],
	): Promise<T[]> {
		const result = await this.query<T>(text, params);
		return result.rows;
	}

	/**
	 * Execute a transaction.
	 *
	 * The callback's session runs every statement on the same connection.
	 * Any error rolls the transaction back and is rethrown.
	 */
	async transaction<T>(callback: (session: Queryable) => Promise<T>): Promise<T> {
		if (!this.connected) {
			throw new Error("PostgresClient is not connected");
		}

		const client = await this.pool.connect();
		try {
			await client.query("BEGIN");
			const result = await callback(new PostgresSession(client));
			await client.query("COMMIT");
			return result;
		} catch (error) {
			await client.query("ROLLBACK");
			throw error;
		} finally {
			client.release();
		}
	}

	/**
	 * Check if connected
	 */
	isConnected(): boolean {
		return this.connected;
	}

	/**
	 * Verify connection health by executing a test query
	 */
	async healthCheck(): Promise<boolean> {
		if (!this.connected) {
			return false;
		}

		try {
			const client = await this.pool.connect();
			try {
				await client.query("SELECT 1");
				return true;
			} finally {
				client.release();
			}
		} catch {
			this.connected = false;
			return false;
		}
	}
}
