import { NotFoundError } from "@folio/common";
import {
	type CallOptions,
	type IdentityProvider,
	type IdentityUser,
	projectAuthzNames,
} from "@folio/keycloak";
import { type Logger, withProjectContext } from "@folio/logger";
import type { EntityStore } from "../repositories";
import { callWithRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from "./provisioning";

export interface MembershipServiceOptions {
	idp: IdentityProvider;
	appName: string;
	logger: Logger;
	retry?: Partial<RetryPolicy>;
}

/** An identity-provider object found by name */
export interface AuthzObjectRef {
	id: string;
	name: string;
}

/**
 * A project's admin group and its members, and the resource the group's
 * permission covers.
 */
export class MembershipService {
	private readonly idp: IdentityProvider;
	private readonly appName: string;
	private readonly logger: Logger;
	private readonly retry: RetryPolicy;

	constructor(
		private readonly store: EntityStore,
		options: MembershipServiceOptions,
	) {
		this.idp = options.idp;
		this.appName = options.appName;
		this.logger = options.logger;
		this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
	}

	/**
	 * @throws NotFoundError for an unknown project, or a project whose resource is missing
	 */
	async getResource(slug: string): Promise<AuthzObjectRef> {
		await this.assertProject(slug);

		const name = projectAuthzNames(this.appName, slug).resource;
		const id = await this.call((opts) => this.idp.findResourceByName(name, opts));
		if (!id) {
			throw new NotFoundError("resource", name);
		}
		return { id, name };
	}

	async getGroup(slug: string): Promise<AuthzObjectRef> {
		await this.assertProject(slug);
		return this.findGroup(slug);
	}

	async listMembers(slug: string): Promise<IdentityUser[]> {
		const groupId = await this.resolveGroup(slug);
		return this.call((opts) => this.idp.listGroupMembers(groupId, opts));
	}

	/**
	 * @returns false when the user already was a member
	 */
	async addMember(slug: string, username: string): Promise<boolean> {
		const groupId = await this.resolveGroup(slug);
		const user = await this.resolveUser(username);

		const added = await this.call((opts) => this.idp.addGroupMember(groupId, user.id, opts));
		withProjectContext(this.logger, { slug }).info({ username, added }, "Group member added");
		return added;
	}

	async removeMember(slug: string, username: string): Promise<void> {
		const groupId = await this.resolveGroup(slug);
		const user = await this.resolveUser(username);

		await this.call((opts) => this.idp.removeGroupMember(groupId, user.id, opts));
		withProjectContext(this.logger, { slug }).info({ username }, "Group member removed");
	}

	private async resolveGroup(slug: string): Promise<string> {
		await this.assertProject(slug);
		return (await this.findGroup(slug)).id;
	}

	private async assertProject(slug: string): Promise<void> {
		const project = await this.store.transaction((repos) => repos.projects.findBySlug(slug));
		if (!project) {
			throw new NotFoundError("project", slug);
		}
	}

	private async findGroup(slug: string): Promise<AuthzObjectRef> {
		const name = projectAuthzNames(this.appName, slug).group;
		const id = await this.call((opts) => this.idp.findGroupByName(name, opts));
		if (!id) {
			throw new NotFoundError("group", name);
		}
		return { id, name };
	}

	private async resolveUser(username: string): Promise<IdentityUser> {
		const user = await this.call((opts) => this.idp.findUserByUsername(username, opts));
		if (!user) {
			throw new NotFoundError("user", username);
		}
		return user;
	}

	private call<T>(fn: (options: CallOptions) => Promise<T>): Promise<T> {
		return callWithRetry(fn, this.retry, this.logger);
	}
}
