import type { PostgresClient } from "@folio/storage";
import { createPostgresRepositories } from "./db";
import { translateDbError } from "./db/errors";
import type { EntityStore, Repositories } from "./repositories";

/**
 * Entity store backed by PostgreSQL. Each transaction holds one pooled
 * connection from BEGIN to COMMIT/ROLLBACK.
 */
export class PostgresEntityStore implements EntityStore {
	constructor(private readonly client: PostgresClient) {}

	async transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
		try {
			return await this.client.transaction((session) => fn(createPostgresRepositories(session)));
		} catch (error) {
			throw translateDbError(error);
		}
	}
}
