/**
 * In-memory identity provider for tests.
 *
 * Implements the full identity-provider contract without a network, keeps
 * state inspectable, and lets a test fail, stall or observe any operation.
 *
 * @module @folio/keycloak-mock/provider
 */

import { IdentityProviderError, TimeoutError, toError } from "@folio/common";
import type {
	CallOptions,
	EnsureResult,
	GroupPolicySpec,
	GroupSpec,
	IdentityProvider,
	IdentityUser,
	ResourcePermission,
	ResourceSpec,
	ScopePermissionSpec,
} from "@folio/keycloak";

export type IdpOperation = keyof IdentityProvider;

export interface RecordedCall {
	operation: IdpOperation;
	args: unknown[];
}

export interface StoredResource {
	id: string;
	name: string;
	type: string;
	scopes: string[];
	attributes: Record<string, string[]>;
}

export interface StoredGroup {
	id: string;
	name: string;
	attributes: Record<string, string[]>;
	members: Set<string>;
}

export interface StoredPolicy {
	id: string;
	name: string;
	groupId: string;
}

export interface StoredPermission {
	id: string;
	name: string;
	resourceId: string;
	policyId: string;
	scopes: string[];
}

interface Fault {
	error: () => Error;
	remaining: number;
}

export interface InMemoryIdentityProviderOptions {
	/** How long a stalled call waits before timing out when it has no signal (default: 10) */
	stallTimeoutMs?: number;
}

export class InMemoryIdentityProvider implements IdentityProvider {
	// =========================================================================
	// In-Memory State
	// =========================================================================

	readonly resources = new Map<string, StoredResource>();
	readonly groups = new Map<string, StoredGroup>();
	readonly policies = new Map<string, StoredPolicy>();
	readonly permissions = new Map<string, StoredPermission>();
	readonly users = new Map<string, IdentityUser>();

	/** Every call in order, including failed ones */
	readonly calls: RecordedCall[] = [];

	private readonly tokens = new Map<string, { userId?: string; grants: ResourcePermission[] }>();
	private readonly faults = new Map<IdpOperation, Fault[]>();
	private readonly stalls = new Set<IdpOperation>();
	private readonly hooks = new Map<IdpOperation, Array<(args: unknown[]) => void>>();
	private readonly stallTimeoutMs: number;
	private nextId = 1;

	constructor(options: InMemoryIdentityProviderOptions = {}) {
		this.stallTimeoutMs = options.stallTimeoutMs ?? 10;
	}

	// =========================================================================
	// Test controls
	// =========================================================================

	/**
	 * Register a user the provider knows about.
	 */
	addUser(user: IdentityUser): this {
		this.users.set(user.id, user);
		return this;
	}

	/**
	 * Accept an access token. Its RPT permissions are the explicit grants plus
	 * whatever the stored permissions grant to the user's groups.
	 */
	registerToken(token: string, userId?: string, grants: ResourcePermission[] = []): this {
		this.tokens.set(token, { userId, grants });
		return this;
	}

	/**
	 * Make the next `times` calls of an operation throw.
	 */
	failOn(operation: IdpOperation, error: Error | (() => Error), times = Number.POSITIVE_INFINITY): this {
		const queue = this.faults.get(operation) ?? [];
		queue.push({ error: typeof error === "function" ? error : () => error, remaining: times });
		this.faults.set(operation, queue);
		return this;
	}

	/**
	 * Make every call of an operation hang until its signal aborts. Without a
	 * signal the call fails with a timeout after `stallTimeoutMs`.
	 */
	stall(operation: IdpOperation): this {
		this.stalls.add(operation);
		return this;
	}

	/**
	 * Run a callback whenever an operation is entered, before it takes effect.
	 */
	onCall(operation: IdpOperation, hook: (args: unknown[]) => void): this {
		const hooks = this.hooks.get(operation) ?? [];
		hooks.push(hook);
		this.hooks.set(operation, hooks);
		return this;
	}

	/**
	 * Remove faults, stalls and hooks. State and call log are kept.
	 */
	clearFaults(): void {
		this.faults.clear();
		this.stalls.clear();
		this.hooks.clear();
	}

	callsTo(operation: IdpOperation): RecordedCall[] {
		return this.calls.filter((call) => call.operation === operation);
	}

	/**
	 * Number of stored authorization objects (users and tokens excluded).
	 */
	objectCount(): number {
		return this.resources.size + this.groups.size + this.policies.size + this.permissions.size;
	}

	findGroup(name: string): StoredGroup | undefined {
		return [...this.groups.values()].find((g) => g.name === name);
	}

	findResource(name: string): StoredResource | undefined {
		return [...this.resources.values()].find((r) => r.name === name);
	}

	findPermission(name: string): StoredPermission | undefined {
		return [...this.permissions.values()].find((p) => p.name === name);
	}

	findPolicy(name: string): StoredPolicy | undefined {
		return [...this.policies.values()].find((p) => p.name === name);
	}

	// =========================================================================
	// Helpers
	// =========================================================================

	private id(kind: string): string {
		return `${kind}-${this.nextId++}`;
	}

	private async enter(operation: IdpOperation, args: unknown[], options?: CallOptions): Promise<void> {
		this.calls.push({ operation, args });
		const signal = options?.signal;

		if (signal?.aborted) {
			throw toError(signal.reason);
		}

		for (const hook of this.hooks.get(operation) ?? []) {
			hook(args);
		}
		if (signal?.aborted) {
			throw toError(signal.reason);
		}

		const queue = this.faults.get(operation);
		const fault = queue?.[0];
		if (queue && fault) {
			fault.remaining--;
			if (fault.remaining <= 0) {
				queue.shift();
			}
			throw fault.error();
		}

		if (this.stalls.has(operation)) {
			await this.wait(operation, signal);
		}
	}

	private wait(operation: IdpOperation, signal?: AbortSignal): Promise<never> {
		return new Promise((_resolve, reject) => {
			if (signal) {
				signal.addEventListener("abort", () => reject(toError(signal.reason)), { once: true });
				return;
			}
			setTimeout(() => reject(new TimeoutError(operation, this.stallTimeoutMs)), this.stallTimeoutMs);
		});
	}

	private byName<T extends { id: string; name: string }>(map: Map<string, T>, name: string): T | undefined {
		return [...map.values()].find((item) => item.name === name);
	}

	// =========================================================================
	// Resources
	// =========================================================================

	async findResourceByName(name: string, options?: CallOptions): Promise<string | null> {
		await this.enter("findResourceByName", [name], options);
		return this.byName(this.resources, name)?.id ?? null;
	}

	async ensureResource(spec: ResourceSpec, options?: CallOptions): Promise<EnsureResult> {
		await this.enter("ensureResource", [spec], options);
		const existing = this.byName(this.resources, spec.name);
		if (existing) {
			return { id: existing.id, created: false };
		}
		const resource: StoredResource = {
			id: this.id("resource"),
			name: spec.name,
			type: spec.type,
			scopes: [...spec.scopes],
			attributes: spec.attributes,
		};
		this.resources.set(resource.id, resource);
		return { id: resource.id, created: true };
	}

	async deleteResource(resourceId: string, options?: CallOptions): Promise<void> {
		await this.enter("deleteResource", [resourceId], options);
		this.resources.delete(resourceId);
	}

	// =========================================================================
	// Groups and membership
	// =========================================================================

	async findGroupByName(name: string, options?: CallOptions): Promise<string | null> {
		await this.enter("findGroupByName", [name], options);
		return this.byName(this.groups, name)?.id ?? null;
	}

	async ensureGroup(spec: GroupSpec, options?: CallOptions): Promise<EnsureResult> {
		await this.enter("ensureGroup", [spec], options);
		const existing = this.byName(this.groups, spec.name);
		if (existing) {
			return { id: existing.id, created: false };
		}
		const group: StoredGroup = {
			id: this.id("group"),
			name: spec.name,
			attributes: spec.attributes,
			members: new Set(),
		};
		this.groups.set(group.id, group);
		return { id: group.id, created: true };
	}

	async deleteGroup(groupId: string, options?: CallOptions): Promise<void> {
		await this.enter("deleteGroup", [groupId], options);
		this.groups.delete(groupId);
	}

	async addGroupMember(groupId: string, userId: string, options?: CallOptions): Promise<boolean> {
		await this.enter("addGroupMember", [groupId, userId], options);
		const group = this.groups.get(groupId);
		if (!group) {
			throw new IdentityProviderError("addGroupMember", 404, `group '${groupId}' not found`);
		}
		if (!this.users.has(userId)) {
			throw new IdentityProviderError("addGroupMember", 404, `user '${userId}' not found`);
		}
		if (group.members.has(userId)) {
			return false;
		}
		group.members.add(userId);
		return true;
	}

	async removeGroupMember(groupId: string, userId: string, options?: CallOptions): Promise<void> {
		await this.enter("removeGroupMember", [groupId, userId], options);
		this.groups.get(groupId)?.members.delete(userId);
	}

	async listGroupMembers(groupId: string, options?: CallOptions): Promise<IdentityUser[]> {
		await this.enter("listGroupMembers", [groupId], options);
		const group = this.groups.get(groupId);
		if (!group) {
			throw new IdentityProviderError("listGroupMembers", 404, `group '${groupId}' not found`);
		}
		return [...group.members].flatMap((id) => {
			const user = this.users.get(id);
			return user ? [user] : [];
		});
	}

	async findUserByUsername(username: string, options?: CallOptions): Promise<IdentityUser | null> {
		await this.enter("findUserByUsername", [username], options);
		const wanted = username.toLowerCase();
		return [...this.users.values()].find((u) => u.username.toLowerCase() === wanted) ?? null;
	}

	// =========================================================================
	// Policies and permissions
	// =========================================================================

	async ensureGroupPolicy(spec: GroupPolicySpec, options?: CallOptions): Promise<EnsureResult> {
		await this.enter("ensureGroupPolicy", [spec], options);
		const existing = this.byName(this.policies, spec.name);
		if (existing) {
			return { id: existing.id, created: false };
		}
		if (!this.groups.has(spec.groupId)) {
			throw new IdentityProviderError("ensureGroupPolicy", 400, `group '${spec.groupId}' not found`);
		}
		const policy: StoredPolicy = { id: this.id("policy"), name: spec.name, groupId: spec.groupId };
		this.policies.set(policy.id, policy);
		return { id: policy.id, created: true };
	}

	async findPolicyByName(name: string, options?: CallOptions): Promise<string | null> {
		await this.enter("findPolicyByName", [name], options);
		return this.byName(this.policies, name)?.id ?? null;
	}

	async deletePolicy(policyId: string, options?: CallOptions): Promise<void> {
		await this.enter("deletePolicy", [policyId], options);
		this.policies.delete(policyId);
	}

	async ensureScopePermission(
		spec: ScopePermissionSpec,
		options?: CallOptions,
	): Promise<EnsureResult> {
		await this.enter("ensureScopePermission", [spec], options);
		const existing = this.byName(this.permissions, spec.name);
		if (existing) {
			return { id: existing.id, created: false };
		}
		if (!this.resources.has(spec.resourceId) || !this.policies.has(spec.policyId)) {
			throw new IdentityProviderError(
				"ensureScopePermission",
				400,
				"permission references an unknown resource or policy",
			);
		}
		const permission: StoredPermission = {
			id: this.id("permission"),
			name: spec.name,
			resourceId: spec.resourceId,
			policyId: spec.policyId,
			scopes: [...spec.scopes],
		};
		this.permissions.set(permission.id, permission);
		return { id: permission.id, created: true };
	}

	async findPermissionByName(name: string, options?: CallOptions): Promise<string | null> {
		await this.enter("findPermissionByName", [name], options);
		return this.byName(this.permissions, name)?.id ?? null;
	}

	async deletePermission(permissionId: string, options?: CallOptions): Promise<void> {
		await this.enter("deletePermission", [permissionId], options);
		this.permissions.delete(permissionId);
	}

	// =========================================================================
	// RPT
	// =========================================================================

	async getPermissions(accessToken: string, options?: CallOptions): Promise<ResourcePermission[]> {
		await this.enter("getPermissions", [accessToken], options);
		const token = this.tokens.get(accessToken);
		if (!token) {
			throw new IdentityProviderError("getPermissions", 401, "invalid token");
		}

		const derived: ResourcePermission[] = [];
		const userId = token.userId;
		if (userId) {
			for (const permission of this.permissions.values()) {
				const policy = this.policies.get(permission.policyId);
				const group = policy ? this.groups.get(policy.groupId) : undefined;
				const resource = this.resources.get(permission.resourceId);
				if (group?.members.has(userId) && resource) {
					derived.push({
						resourceId: resource.id,
						resourceName: resource.name,
						scopes: [...permission.scopes],
					});
				}
			}
		}
		return [...token.grants, ...derived];
	}
}
