/**
 * @folio/core/testing - In-process stand-ins for tests. Loads
 * @folio/keycloak-mock, which consumers declare as a dev dependency.
 *
 * @example
 * ```ts
 * import { createTestContext } from "@folio/core/testing";
 *
 * const { services, idp } = createTestContext();
 * await services.projects.create({ slug: "covid-survey", ... });
 * expect(idp.findGroup("app-covid-survey-admin")?.members.has("u1")).toBe(true);
 * ```
 *
 * @module @folio/core/testing
 */

export type { TestContext, TestContextOptions } from "./fixtures";
export { createTestContext } from "./fixtures";
export type { InMemoryEntityStoreOptions, TableName, WriteOperation } from "./store";
export { InMemoryEntityStore } from "./store";
