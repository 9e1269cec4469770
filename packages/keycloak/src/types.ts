/**
 * Identity-provider contract consumed by the provisioning saga and the API.
 *
 * @module @folio/keycloak/types
 */

/**
 * Per-call options. The signal cancels the call; implementations also apply
 * their own deadline.
 */
export interface CallOptions {
	signal?: AbortSignal;
}

/**
 * Result of a check-then-create call. `created` is false when an object with
 * the requested name already existed and was reused.
 */
export interface EnsureResult {
	id: string;
	created: boolean;
}

export type Attributes = Record<string, string[]>;

export interface ResourceSpec {
	name: string;
	displayName?: string;
	type: string;
	scopes: readonly string[];
	attributes: Attributes;
}

export interface GroupSpec {
	name: string;
	attributes: Attributes;
}

export interface GroupPolicySpec {
	name: string;
	groupId: string;
	description?: string;
}

export interface ScopePermissionSpec {
	name: string;
	resourceId: string;
	policyId: string;
	scopes: readonly string[];
	description?: string;
}

export interface IdentityUser {
	id: string;
	username: string;
	email?: string;
	firstName?: string;
	lastName?: string;
	enabled?: boolean;
}

/**
 * One entry of an RPT permission list.
 */
export interface ResourcePermission {
	resourceId: string;
	resourceName: string;
	scopes: string[];
}

export interface IdentityProvider {
	ensureResource(spec: ResourceSpec, options?: CallOptions): Promise<EnsureResult>;
	findResourceByName(name: string, options?: CallOptions): Promise<string | null>;
	deleteResource(resourceId: string, options?: CallOptions): Promise<void>;

	ensureGroup(spec: GroupSpec, options?: CallOptions): Promise<EnsureResult>;
	findGroupByName(name: string, options?: CallOptions): Promise<string | null>;
	deleteGroup(groupId: string, options?: CallOptions): Promise<void>;

	/** Returns whether the membership was added (false if already a member) */
	addGroupMember(groupId: string, userId: string, options?: CallOptions): Promise<boolean>;
	removeGroupMember(groupId: string, userId: string, options?: CallOptions): Promise<void>;
	listGroupMembers(groupId: string, options?: CallOptions): Promise<IdentityUser[]>;
	findUserByUsername(username: string, options?: CallOptions): Promise<IdentityUser | null>;

	ensureGroupPolicy(spec: GroupPolicySpec, options?: CallOptions): Promise<EnsureResult>;
	findPolicyByName(name: string, options?: CallOptions): Promise<string | null>;
	deletePolicy(policyId: string, options?: CallOptions): Promise<void>;

	ensureScopePermission(spec: ScopePermissionSpec, options?: CallOptions): Promise<EnsureResult>;
	findPermissionByName(name: string, options?: CallOptions): Promise<string | null>;
	deletePermission(permissionId: string, options?: CallOptions): Promise<void>;

	/**
	 * Exchange a user's access token for its RPT permission list. An empty
	 * list means the token is valid but grants nothing.
	 */
	getPermissions(accessToken: string, options?: CallOptions): Promise<ResourcePermission[]>;
}
