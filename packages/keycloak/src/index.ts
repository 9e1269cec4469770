/**
 * @folio/keycloak - Identity-provider contract and Keycloak client.
 *
 * @example
 * ```ts
 * import { KeycloakAdminClient, projectAuthzNames } from "@folio/keycloak";
 *
 * const idp = new KeycloakAdminClient({ host, realm, clientId, clientSecret });
 * const names = projectAuthzNames("folio", "covid-survey");
 * ```
 *
 * @module @folio/keycloak
 */

export type { KeycloakClientOptions } from "./client";
export { KeycloakAdminClient } from "./client";
export type { ProjectAuthzNames } from "./naming";
export { grantedScopes, PROJECT_SCOPES, projectAuthzNames } from "./naming";
export type {
	Attributes,
	CallOptions,
	EnsureResult,
	GroupPolicySpec,
	GroupSpec,
	IdentityProvider,
	IdentityUser,
	ResourcePermission,
	ResourceSpec,
	ScopePermissionSpec,
} from "./types";
