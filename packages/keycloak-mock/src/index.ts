/**
 * In-process identity provider for tests.
 *
 * @example
 * ```ts
 * import { InMemoryIdentityProvider } from "@folio/keycloak-mock";
 *
 * const idp = new InMemoryIdentityProvider().addUser({ id: "u1", username: "alice" });
 * idp.failOn("ensureScopePermission", new IdentityProviderError("createPermission", 500), 3);
 * ```
 *
 * @module @folio/keycloak-mock
 */

export type {
	IdpOperation,
	InMemoryIdentityProviderOptions,
	RecordedCall,
	StoredGroup,
	StoredPermission,
	StoredPolicy,
	StoredResource,
} from "./provider";
export { InMemoryIdentityProvider } from "./provider";
