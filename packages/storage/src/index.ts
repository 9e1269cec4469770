export type { QueryResult, QueryResultRow } from "pg";
export type { PostgresClientOptions, PostgresErrorInfo, Queryable } from "./postgres";
export { getPostgresErrorInfo, PostgresClient, SqlState } from "./postgres";
