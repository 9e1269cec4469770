/**
 * Authorization provisioning for new projects.
 *
 * Five identity-provider steps run in order. Each step that creates an
 * object registers a compensation; on failure or cancellation the
 * compensations run newest first and the caller gets a
 * ProvisioningFailedError naming the failed step. An object that turns up
 * only after a retried call counts as created: the attempt that timed out
 * made it.
 *
 * A graph that outlives its project rows is removed with `deprovision`.
 *
 * @module @folio/core/services/provisioning
 */

import {
	type ProvisioningStep,
	ProvisioningFailedError,
	toError,
	withRetry,
} from "@folio/common";
import {
	type CallOptions,
	type EnsureResult,
	type IdentityProvider,
	PROJECT_SCOPES,
	projectAuthzNames,
} from "@folio/keycloak";
import { type Logger, withProjectContext } from "@folio/logger";
import type { Project } from "../types";

export interface RetryPolicy {
	/** Attempts per call, including the first (default: 3) */
	maxAttempts: number;
	initialDelayMs: number;
	maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	maxAttempts: 3,
	initialDelayMs: 250,
	maxDelayMs: 5000,
};

export interface ProvisionOptions {
	/** Aborting runs the same rollback as a failure */
	signal?: AbortSignal;
}

export type AuthzObject = "resource" | "group" | "policy" | "permission";

/**
 * Identifiers of the provisioned graph. `created` lists the objects this
 * run created, as opposed to reused.
 */
export interface ProvisioningResult {
	resourceId: string;
	groupId: string;
	policyId: string;
	permissionId: string;
	memberAdded: boolean;
	created: AuthzObject[];
	/** Users dropped from a reused admin group so that only the owner remains */
	removedMembers: string[];
	/**
	 * Undo this run, newest first, for when the surrounding transaction
	 * fails after provisioning. Returns the compensations that failed.
	 */
	rollback(): Promise<string[]>;
}

export interface Provisioner {
	provision(project: Project, options?: ProvisionOptions): Promise<ProvisioningResult>;
}

export interface DeprovisioningResult {
	slug: string;
	/** Objects found and deleted, in deletion order */
	deleted: AuthzObject[];
}

export interface Deprovisioner {
	/**
	 * Delete the authorization graph named after `slug`. Objects that are
	 * already gone are skipped.
	 */
	deprovision(slug: string): Promise<DeprovisioningResult>;
}

export interface ProvisioningServiceOptions {
	idp: IdentityProvider;
	/** Prefix of every object name, e.g. "folio" */
	appName: string;
	logger: Logger;
	retry?: Partial<RetryPolicy>;
}

interface Compensation {
	name: string;
	run: (options: CallOptions) => Promise<void>;
}

interface StepOutcome<T> {
	value: T;
	/** More than one attempt was made */
	retried: boolean;
}

/**
 * Retry wrapper for identity-provider calls.
 */
export function callWithRetry<T>(
	call: (options: CallOptions) => Promise<T>,
	policy: RetryPolicy,
	logger: Logger,
	signal?: AbortSignal,
): Promise<T> {
	return withRetry(() => call({ signal }), {
		maxRetries: Math.max(policy.maxAttempts - 1, 0),
		initialDelayMs: policy.initialDelayMs,
		maxDelayMs: policy.maxDelayMs,
		signal,
		onRetry: (error, attempt, delayMs) => {
			logger.warn({ err: toError(error), attempt, delayMs }, "Retrying identity-provider call");
		},
	});
}

export class ProvisioningService implements Provisioner, Deprovisioner {
	private readonly idp: IdentityProvider;
	private readonly appName: string;
	private readonly logger: Logger;
	private readonly retry: RetryPolicy;

	constructor(options: ProvisioningServiceOptions) {
		this.idp = options.idp;
		this.appName = options.appName;
		this.logger = options.logger;
		this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
	}

	async provision(project: Project, options: ProvisionOptions = {}): Promise<ProvisioningResult> {
		const { signal } = options;
		const names = projectAuthzNames(this.appName, project.slug);
		const log = withProjectContext(this.logger, { projectId: project.id, slug: project.slug });
		const compensations: Compensation[] = [];
		const created: AuthzObject[] = [];
		let step: ProvisioningStep = "create-resource";

		const owned = (kind: AuthzObject, outcome: StepOutcome<EnsureResult>): boolean => {
			if (!outcome.value.created && !outcome.retried) {
				return false;
			}
			if (!outcome.value.created) {
				log.warn({ object: kind, id: outcome.value.id }, "Object found after a retry, treating as created");
			}
			created.push(kind);
			return true;
		};

		try {
			const resource = await this.runStep(step, log, signal, (opts) =>
				this.idp.ensureResource(
					{
						name: names.resource,
						displayName: project.name,
						type: names.resourceType,
						scopes: PROJECT_SCOPES,
						attributes: {
							project_slug: [project.slug],
							created_by: [project.userId],
						},
					},
					opts,
				),
			);
			const resourceId = resource.value.id;
			if (owned("resource", resource)) {
				compensations.push({
					name: "delete-resource",
					run: (opts) => this.idp.deleteResource(resourceId, opts),
				});
			}

			step = "create-group";
			const group = await this.runStep(step, log, signal, (opts) =>
				this.idp.ensureGroup(
					{
						name: names.group,
						attributes: { project_slug: [project.slug], group_type: ["project"] },
					},
					opts,
				),
			);
			const groupId = group.value.id;
			const groupOwned = owned("group", group);
			if (groupOwned) {
				compensations.push({
					name: "delete-group",
					run: (opts) => this.idp.deleteGroup(groupId, opts),
				});
			}

			step = "add-member";
			const removedMembers = groupOwned
				? []
				: await this.resetMembers(groupId, project.userId, compensations, log, signal);
			const added = await this.runStep(step, log, signal, (opts) =>
				this.idp.addGroupMember(groupId, project.userId, opts),
			);
			const memberAdded = added.value || added.retried;
			// Deleting a created group drops its members with it
			if (memberAdded && !groupOwned) {
				compensations.push({
					name: "remove-member",
					run: (opts) => this.idp.removeGroupMember(groupId, project.userId, opts),
				});
			}

			step = "create-policy";
			const policy = await this.runStep(step, log, signal, (opts) =>
				this.idp.ensureGroupPolicy(
					{
						name: names.policy,
						groupId,
						description: `Admin group policy for project ${project.slug}`,
					},
					opts,
				),
			);
			const policyId = policy.value.id;
			if (owned("policy", policy)) {
				compensations.push({
					name: "delete-policy",
					run: (opts) => this.idp.deletePolicy(policyId, opts),
				});
			}

			step = "create-permission";
			const permission = await this.runStep(step, log, signal, (opts) =>
				this.idp.ensureScopePermission(
					{
						name: names.permission,
						resourceId,
						policyId,
						scopes: PROJECT_SCOPES,
						description: `Admin permission for project ${project.slug}`,
					},
					opts,
				),
			);
			const permissionId = permission.value.id;
			if (owned("permission", permission)) {
				compensations.push({
					name: "delete-permission",
					run: (opts) => this.idp.deletePermission(permissionId, opts),
				});
			}

			log.info({ created, removedMembers }, "Project authorization provisioned");

			return {
				resourceId,
				groupId,
				policyId,
				permissionId,
				memberAdded,
				created,
				removedMembers,
				rollback: () => {
					log.warn("Rolling back provisioned authorization");
					return this.compensate(compensations.splice(0), log);
				},
			};
		} catch (error) {
			const cause = toError(error);
			log.error({ err: cause, step }, "Provisioning failed, rolling back");

			const failures = await this.compensate(compensations, log);
			throw new ProvisioningFailedError(project.slug, step, cause, failures);
		}
	}

	async deprovision(slug: string): Promise<DeprovisioningResult> {
		const names = projectAuthzNames(this.appName, slug);
		const log = withProjectContext(this.logger, { slug });
		const targets: Array<{
			kind: AuthzObject;
			find: (options: CallOptions) => Promise<string | null>;
			remove: (id: string, options: CallOptions) => Promise<void>;
		}> = [
			{
				kind: "permission",
				find: (opts) => this.idp.findPermissionByName(names.permission, opts),
				remove: (id, opts) => this.idp.deletePermission(id, opts),
			},
			{
				kind: "policy",
				find: (opts) => this.idp.findPolicyByName(names.policy, opts),
				remove: (id, opts) => this.idp.deletePolicy(id, opts),
			},
			{
				kind: "group",
				find: (opts) => this.idp.findGroupByName(names.group, opts),
				remove: (id, opts) => this.idp.deleteGroup(id, opts),
			},
			{
				kind: "resource",
				find: (opts) => this.idp.findResourceByName(names.resource, opts),
				remove: (id, opts) => this.idp.deleteResource(id, opts),
			},
		];

		const deleted: AuthzObject[] = [];
		for (const target of targets) {
			const id = await callWithRetry(target.find, this.retry, log);
			if (!id) {
				continue;
			}
			await callWithRetry((opts) => target.remove(id, opts), this.retry, log);
			deleted.push(target.kind);
		}

		log.info({ deleted }, "Project authorization removed");
		return { slug, deleted };
	}

	private async runStep<T>(
		step: ProvisioningStep,
		log: Logger,
		signal: AbortSignal | undefined,
		call: (options: CallOptions) => Promise<T>,
	): Promise<StepOutcome<T>> {
		signal?.throwIfAborted();
		const stepLog = log.child({ step });
		stepLog.debug("Running provisioning step");

		let attempts = 0;
		const value = await callWithRetry(
			(opts) => {
				attempts++;
				return call(opts);
			},
			this.retry,
			stepLog,
			signal,
		);
		return { value, retried: attempts > 1 };
	}

	/**
	 * Drop everyone but the owner from a reused admin group. Registers a
	 * compensation that puts them back.
	 */
	private async resetMembers(
		groupId: string,
		ownerId: string,
		compensations: Compensation[],
		log: Logger,
		signal: AbortSignal | undefined,
	): Promise<string[]> {
		const members = await callWithRetry(
			(opts) => this.idp.listGroupMembers(groupId, opts),
			this.retry,
			log,
			signal,
		);
		const removed: string[] = [];

		for (const member of members) {
			if (member.id === ownerId) {
				continue;
			}
			await callWithRetry(
				(opts) => this.idp.removeGroupMember(groupId, member.id, opts),
				this.retry,
				log,
				signal,
			);
			removed.push(member.id);
			compensations.push({
				name: "restore-member",
				run: async (opts) => {
					await this.idp.addGroupMember(groupId, member.id, opts);
				},
			});
		}

		if (removed.length > 0) {
			log.warn({ groupId, removed }, "Removed stale members from reused admin group");
		}
		return removed;
	}

	/**
	 * Run compensations newest first. Returns the names of those that failed.
	 */
	private async compensate(compensations: Compensation[], log: Logger): Promise<string[]> {
		const failures: string[] = [];

		for (const compensation of [...compensations].reverse()) {
			try {
				await callWithRetry(compensation.run, this.retry, log);
				log.info({ compensation: compensation.name }, "Compensation applied");
			} catch (error) {
				failures.push(compensation.name);
				log.error(
					{ err: toError(error), compensation: compensation.name },
					"Compensation failed, identity-provider object left behind",
				);
			}
		}

		return failures;
	}
}
