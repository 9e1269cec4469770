/**
 * HTTP client for the Keycloak Admin REST API and the UMA token endpoint.
 *
 * Authenticates with the client-credentials grant of the owning client and
 * manages objects under `clients/<uuid>/authz/resource-server`.
 *
 * @module @folio/keycloak/client
 */

import { IdentityProviderError, TimeoutError, toError } from "@folio/common";
import type { Logger } from "@folio/logger";
import { z } from "zod";
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
} from "./types";

export interface KeycloakClientOptions {
	/** Base URL, e.g. http://keycloak:8080 */
	host: string;
	realm: string;
	/** Client that owns the project resources (also the RPT audience) */
	clientId: string;
	clientSecret: string;
	/** Per-call deadline in milliseconds (default: 10000) */
	timeoutMs?: number;
	logger?: Logger;
}

// =============================================================================
// Response schemas
// =============================================================================

const TokenResponseSchema = z.object({
	access_token: z.string(),
	expires_in: z.number().default(60),
});

const ClientListSchema = z.array(z.object({ id: z.string(), clientId: z.string() }));

const ResourceSchema = z.object({ _id: z.string(), name: z.string() });

const NamedObjectSchema = z.object({ id: z.string(), name: z.string() });

const CreatedSchema = z.object({ id: z.string() });

const UserSchema = z.object({
	id: z.string(),
	username: z.string(),
	email: z.string().optional(),
	firstName: z.string().optional(),
	lastName: z.string().optional(),
	enabled: z.boolean().optional(),
});

const RptPermissionSchema = z.object({
	rsid: z.string(),
	rsname: z.string(),
	scopes: z.array(z.string()).default([]),
});

const UMA_GRANT_TYPE = "urn:ietf:params:oauth:grant-type:uma-ticket";

/** Refresh the service token this long before it expires */
const TOKEN_EXPIRY_MARGIN_MS = 30_000;

/**
 * A response whose body has been read in full under the call's deadline.
 */
interface HttpResult {
	status: number;
	headers: Headers;
	body: string;
}

interface AdminRequest {
	method?: string;
	query?: Record<string, string>;
	body?: unknown;
}

export class KeycloakAdminClient implements IdentityProvider {
	private readonly host: string;
	private readonly realm: string;
	private readonly clientId: string;
	private readonly clientSecret: string;
	private readonly timeoutMs: number;
	private readonly logger?: Logger;

	private serviceToken: { value: string; expiresAt: number } | null = null;
	private clientUuid: string | null = null;

	constructor(options: KeycloakClientOptions) {
		this.host = options.host.replace(/\/+$/, "");
		this.realm = options.realm;
		this.clientId = options.clientId;
		this.clientSecret = options.clientSecret;
		this.timeoutMs = options.timeoutMs ?? 10000;
		this.logger = options.logger;
	}

	// ===========================================================================
	// Transport
	// ===========================================================================

	private get tokenUrl(): string {
		return `${this.host}/realms/${encodeURIComponent(this.realm)}/protocol/openid-connect/token`;
	}

	/**
	 * Perform one HTTP call under the per-call deadline. The deadline covers
	 * the body too, so a stalled body ends in a timeout.
	 *
	 * @throws TimeoutError when the deadline expires
	 * @throws IdentityProviderError on a non-2xx status or a network failure
	 */
	private async send(
		operation: string,
		url: string,
		init: RequestInit,
		options: CallOptions = {},
	): Promise<HttpResult> {
		const controller = new AbortController();
		let timedOut = false;
		const timeoutId = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, this.timeoutMs);

		const parent = options.signal;
		const onParentAbort = () => controller.abort();
		if (parent?.aborted) {
			controller.abort();
		} else {
			parent?.addEventListener("abort", onParentAbort, { once: true });
		}

		try {
			const response = await fetch(url, { ...init, signal: controller.signal });
			const body = await response.text();
			this.logger?.debug({ operation, status: response.status }, "Identity provider call");

			if (!response.ok) {
				throw new IdentityProviderError(operation, response.status, body || response.statusText);
			}
			return { status: response.status, headers: response.headers, body };
		} catch (error) {
			if (error instanceof IdentityProviderError) {
				throw error;
			}
			if (timedOut) {
				throw new TimeoutError(operation, this.timeoutMs);
			}
			if (parent?.aborted) {
				throw toError(parent.reason);
			}
			throw new IdentityProviderError(operation, 0, undefined, toError(error));
		} finally {
			clearTimeout(timeoutId);
			parent?.removeEventListener("abort", onParentAbort);
		}
	}

	private parse<S extends z.ZodTypeAny>(
		operation: string,
		response: HttpResult,
		schema: S,
	): z.infer<S> {
		let body: unknown;
		try {
			body = JSON.parse(response.body);
		} catch (error) {
			throw new IdentityProviderError(
				operation,
				response.status,
				"response body is not JSON",
				toError(error),
			);
		}

		const result = schema.safeParse(body);
		if (!result.success) {
			throw new IdentityProviderError(
				operation,
				response.status,
				`unexpected response body: ${result.error.message}`,
			);
		}
		return result.data;
	}

	/**
	 * Service-account token for the admin API, cached until shortly before expiry.
	 */
	private async getServiceToken(options?: CallOptions): Promise<string> {
		if (this.serviceToken && this.serviceToken.expiresAt > Date.now()) {
			return this.serviceToken.value;
		}

		const response = await this.send(
			"getServiceToken",
			this.tokenUrl,
			{
				method: "POST",
				headers: { "Content-Type": "application/x-www-form-urlencoded" },
				body: new URLSearchParams({
					grant_type: "client_credentials",
					client_id: this.clientId,
					client_secret: this.clientSecret,
				}),
			},
			options,
		);
		const token = this.parse("getServiceToken", response, TokenResponseSchema);

		this.serviceToken = {
			value: token.access_token,
			expiresAt: Date.now() + token.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
		};
		return token.access_token;
	}

	private async admin(
		operation: string,
		path: string,
		request: AdminRequest = {},
		options?: CallOptions,
	): Promise<HttpResult> {
		const token = await this.getServiceToken(options);
		const query = request.query ? `?${new URLSearchParams(request.query).toString()}` : "";
		const url = `${this.host}/admin/realms/${encodeURIComponent(this.realm)}${path}${query}`;

		try {
			return await this.send(
				operation,
				url,
				{
					method: request.method ?? "GET",
					headers: {
						Authorization: `Bearer ${token}`,
						...(request.body !== undefined && { "Content-Type": "application/json" }),
					},
					...(request.body !== undefined && { body: JSON.stringify(request.body) }),
				},
				options,
			);
		} catch (error) {
			if (error instanceof IdentityProviderError && error.status === 401) {
				this.serviceToken = null;
			}
			throw error;
		}
	}

	/**
	 * DELETE that treats an already-missing object as deleted.
	 */
	private async adminDelete(operation: string, path: string, options?: CallOptions): Promise<void> {
		try {
			await this.admin(operation, path, { method: "DELETE" }, options);
		} catch (error) {
			if (error instanceof IdentityProviderError && error.status === 404) {
				this.logger?.debug({ operation, path }, "Object already absent");
				return;
			}
			throw error;
		}
	}

	/**
	 * List endpoints answer 204 instead of an empty array on some versions.
	 */
	private async list<S extends z.ZodTypeAny>(
		operation: string,
		path: string,
		query: Record<string, string>,
		schema: S,
		options?: CallOptions,
	): Promise<Array<z.infer<S>>> {
		const response = await this.admin(operation, path, { query }, options);
		if (response.status === 204 || response.body === "") {
			return [];
		}
		return this.parse(operation, response, z.array(schema));
	}

	/**
	 * Internal UUID of the owning client, needed for resource-server paths.
	 */
	private async resourceServerPath(options?: CallOptions): Promise<string> {
		if (!this.clientUuid) {
			const response = await this.admin(
				"resolveClient",
				"/clients",
				{ query: { clientId: this.clientId } },
				options,
			);
			const clients = this.parse("resolveClient", response, ClientListSchema);
			const client = clients.find((c) => c.clientId === this.clientId);
			if (!client) {
				throw new IdentityProviderError(
					"resolveClient",
					404,
					`client '${this.clientId}' not found in realm '${this.realm}'`,
				);
			}
			this.clientUuid = client.id;
		}
		return `/clients/${this.clientUuid}/authz/resource-server`;
	}

	// ===========================================================================
	// Resources
	// ===========================================================================

	async findResourceByName(name: string, options?: CallOptions): Promise<string | null> {
		const rs = await this.resourceServerPath(options);
		const resources = await this.list(
			"findResource",
			`${rs}/resource`,
			{ name, exactName: "true" },
			ResourceSchema,
			options,
		);
		return resources.find((r) => r.name === name)?._id ?? null;
	}

	async ensureResource(spec: ResourceSpec, options?: CallOptions): Promise<EnsureResult> {
		const existing = await this.findResourceByName(spec.name, options);
		if (existing) {
			return { id: existing, created: false };
		}

		const rs = await this.resourceServerPath(options);
		const response = await this.admin(
			"createResource",
			`${rs}/resource`,
			{
				method: "POST",
				body: {
					name: spec.name,
					displayName: spec.displayName ?? spec.name,
					type: spec.type,
					ownerManagedAccess: false,
					scopes: spec.scopes.map((scope) => ({ name: scope })),
					attributes: spec.attributes,
				},
			},
			options,
		);
		const created = this.parse("createResource", response, ResourceSchema);
		return { id: created._id, created: true };
	}

	async deleteResource(resourceId: string, options?: CallOptions): Promise<void> {
		const rs = await this.resourceServerPath(options);
		await this.adminDelete("deleteResource", `${rs}/resource/${resourceId}`, options);
	}

	// ===========================================================================
	// Groups and membership
	// ===========================================================================

	async findGroupByName(name: string, options?: CallOptions): Promise<string | null> {
		const groups = await this.list(
			"findGroup",
			"/groups",
			{ search: name, exact: "true" },
			NamedObjectSchema,
			options,
		);
		return groups.find((g) => g.name === name)?.id ?? null;
	}

	async ensureGroup(spec: GroupSpec, options?: CallOptions): Promise<EnsureResult> {
		const existing = await this.findGroupByName(spec.name, options);
		if (existing) {
			return { id: existing, created: false };
		}

		const response = await this.admin(
			"createGroup",
			"/groups",
			{ method: "POST", body: { name: spec.name, attributes: spec.attributes } },
			options,
		);
		const id = response.headers.get("Location")?.split("/").pop();
		if (!id) {
			throw new IdentityProviderError("createGroup", response.status, "missing Location header");
		}
		return { id, created: true };
	}

	async deleteGroup(groupId: string, options?: CallOptions): Promise<void> {
		await this.adminDelete("deleteGroup", `/groups/${groupId}`, options);
	}

	async addGroupMember(groupId: string, userId: string, options?: CallOptions): Promise<boolean> {
		const groups = await this.list(
			"listUserGroups",
			`/users/${userId}/groups`,
			{ briefRepresentation: "true" },
			NamedObjectSchema,
			options,
		);
		if (groups.some((g) => g.id === groupId)) {
			return false;
		}

		await this.admin(
			"addGroupMember",
			`/users/${userId}/groups/${groupId}`,
			{ method: "PUT" },
			options,
		);
		return true;
	}

	async removeGroupMember(groupId: string, userId: string, options?: CallOptions): Promise<void> {
		await this.adminDelete("removeGroupMember", `/users/${userId}/groups/${groupId}`, options);
	}

	async listGroupMembers(groupId: string, options?: CallOptions): Promise<IdentityUser[]> {
		return this.list("listGroupMembers", `/groups/${groupId}/members`, {}, UserSchema, options);
	}

	async findUserByUsername(username: string, options?: CallOptions): Promise<IdentityUser | null> {
		const users = await this.list(
			"findUser",
			"/users",
			{ username, exact: "true" },
			UserSchema,
			options,
		);
		const wanted = username.toLowerCase();
		return users.find((u) => u.username.toLowerCase() === wanted) ?? null;
	}

	// ===========================================================================
	// Policies and permissions
	// ===========================================================================

	findPolicyByName(name: string, options?: CallOptions): Promise<string | null> {
		return this.findAuthzPolicy("policy", name, options);
	}

	findPermissionByName(name: string, options?: CallOptions): Promise<string | null> {
		return this.findAuthzPolicy("permission", name, options);
	}

	private async findAuthzPolicy(
		kind: "policy" | "permission",
		name: string,
		options?: CallOptions,
	): Promise<string | null> {
		const rs = await this.resourceServerPath(options);
		const policies = await this.list(
			kind === "policy" ? "findPolicy" : "findPermission",
			`${rs}/${kind}`,
			{ name },
			NamedObjectSchema,
			options,
		);
		return policies.find((p) => p.name === name)?.id ?? null;
	}

	async ensureGroupPolicy(spec: GroupPolicySpec, options?: CallOptions): Promise<EnsureResult> {
		const existing = await this.findPolicyByName(spec.name, options);
		if (existing) {
			return { id: existing, created: false };
		}

		const rs = await this.resourceServerPath(options);
		const response = await this.admin(
			"createPolicy",
			`${rs}/policy/group`,
			{
				method: "POST",
				body: {
					name: spec.name,
					description: spec.description,
					logic: "POSITIVE",
					decisionStrategy: "UNANIMOUS",
					groups: [{ id: spec.groupId, extendChildren: false }],
				},
			},
			options,
		);
		const created = this.parse("createPolicy", response, CreatedSchema);
		return { id: created.id, created: true };
	}

	async deletePolicy(policyId: string, options?: CallOptions): Promise<void> {
		const rs = await this.resourceServerPath(options);
		await this.adminDelete("deletePolicy", `${rs}/policy/${policyId}`, options);
	}

	async ensureScopePermission(
		spec: ScopePermissionSpec,
		options?: CallOptions,
	): Promise<EnsureResult> {
		const existing = await this.findPermissionByName(spec.name, options);
		if (existing) {
			return { id: existing, created: false };
		}

		const rs = await this.resourceServerPath(options);
		const response = await this.admin(
			"createPermission",
			`${rs}/permission/scope`,
			{
				method: "POST",
				body: {
					name: spec.name,
					description: spec.description,
					decisionStrategy: "UNANIMOUS",
					resources: [spec.resourceId],
					policies: [spec.policyId],
					scopes: [...spec.scopes],
				},
			},
			options,
		);
		const created = this.parse("createPermission", response, CreatedSchema);
		return { id: created.id, created: true };
	}

	async deletePermission(permissionId: string, options?: CallOptions): Promise<void> {
		// Permissions are policies of type "scope" in the resource server
		const rs = await this.resourceServerPath(options);
		await this.adminDelete("deletePermission", `${rs}/policy/${permissionId}`, options);
	}

	// ===========================================================================
	// RPT
	// ===========================================================================

	async getPermissions(accessToken: string, options?: CallOptions): Promise<ResourcePermission[]> {
		let response: HttpResult;
		try {
			response = await this.send(
				"getPermissions",
				this.tokenUrl,
				{
					method: "POST",
					headers: {
						Authorization: `Bearer ${accessToken}`,
						"Content-Type": "application/x-www-form-urlencoded",
					},
					body: new URLSearchParams({
						grant_type: UMA_GRANT_TYPE,
						audience: this.clientId,
						response_mode: "permissions",
					}),
				},
				options,
			);
		} catch (error) {
			// 403 means the token is valid but no permission was granted
			if (error instanceof IdentityProviderError && error.status === 403) {
				return [];
			}
			throw error;
		}

		const permissions = this.parse(
			"getPermissions",
			response,
			z.array(RptPermissionSchema),
		);
		return permissions.map((p) => ({
			resourceId: p.rsid,
			resourceName: p.rsname,
			scopes: p.scopes,
		}));
	}
}
