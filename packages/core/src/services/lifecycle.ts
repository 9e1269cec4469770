/**
 * Soft delete, restore, purge and wipe across pathogens, projects and
 * studies. Every operation runs in a single transaction.
 *
 * Purge and wipe also remove the authorization graph of every slug that no
 * row holds any more, once the transaction has committed.
 *
 * @module @folio/core/services/lifecycle
 */

import {
	type EntityCounts,
	type EntityKind,
	InvalidReferenceError,
	NotFoundError,
	PurgeBlockedError,
	toError,
} from "@folio/common";
import { type Logger, withProjectContext } from "@folio/logger";
import { assertConfirmation } from "../confirmation";
import type { EntityStore, Repositories } from "../repositories";
import type { Deprovisioner } from "./provisioning";

export type DeleteTarget =
	| { kind: EntityKind; id: string }
	| { kind: "organisation"; organisationId: string }
	| { kind: "user"; userId: string }
	| { kind: "all" };

/**
 * Purge selection. Id, organisation and user scopes select matching rows in
 * any state; `all` selects every soft-deleted row.
 */
export type PurgeScope = DeleteTarget;

export interface RestoreOptions {
	/** Also restore descendants deleted together with the row */
	cascade?: boolean;
}

export interface PurgePreview {
	/** Rows the purge would remove */
	toDelete: EntityCounts;
	/** Active rows in scope; any non-zero count blocks the purge */
	blockers: EntityCounts;
}

export interface LifecycleServiceOptions {
	logger: Logger;
	clock?: () => Date;
	/** Removes identity-provider objects of hard-deleted projects */
	deprovisioner?: Deprovisioner;
}

interface IdSet {
	pathogens: string[];
	projects: string[];
	studies: string[];
}

const EMPTY: IdSet = { pathogens: [], projects: [], studies: [] };

function counts(ids: IdSet): EntityCounts {
	return {
		pathogens: ids.pathogens.length,
		projects: ids.projects.length,
		studies: ids.studies.length,
	};
}

function union(a: readonly string[], b: readonly string[]): string[] {
	return [...new Set([...a, ...b])];
}

function targetFields(target: DeleteTarget): Record<string, string> {
	switch (target.kind) {
		case "organisation":
			return { target: "organisation", organisationId: target.organisationId };
		case "user":
			return { target: "user", userId: target.userId };
		case "all":
			return { target: "all" };
		default:
			return { target: target.kind, id: target.id };
	}
}

export class LifecycleService {
	private readonly logger: Logger;
	private readonly clock: () => Date;
	private readonly deprovisioner?: Deprovisioner;

	constructor(
		private readonly store: EntityStore,
		options: LifecycleServiceOptions,
	) {
		this.logger = options.logger;
		this.clock = options.clock ?? (() => new Date());
		this.deprovisioner = options.deprovisioner;
	}

	// ===========================================================================
	// Soft delete
	// ===========================================================================

	/**
	 * Rows a soft delete would mark, without changing anything.
	 */
	previewSoftDelete(target: DeleteTarget): Promise<EntityCounts> {
		return this.store.transaction(async (repos) => counts(await this.collectActive(repos, target)));
	}

	/**
	 * Soft-delete the target and its live descendants, studies first. All
	 * rows share one `deleted_at`. A target that is already deleted yields
	 * zero counts.
	 */
	async softDelete(target: DeleteTarget): Promise<EntityCounts> {
		const summary = await this.store.transaction(async (repos) => {
			const ids = await this.collectActive(repos, target);
			const at = this.clock();

			return {
				studies: await repos.studies.markDeleted(ids.studies, at),
				projects: await repos.projects.markDeleted(ids.projects, at),
				pathogens: await repos.pathogens.markDeleted(ids.pathogens, at),
			};
		});

		this.logger.info({ ...targetFields(target), ...summary }, "Soft delete applied");
		return summary;
	}

	private async collectActive(repos: Repositories, target: DeleteTarget): Promise<IdSet> {
		switch (target.kind) {
			case "pathogen": {
				const pathogen = await repos.pathogens.findById(target.id, {
					includeDeleted: true,
					lock: "update",
				});
				if (!pathogen) throw new NotFoundError("pathogen", target.id);
				if (pathogen.deletedAt) return EMPTY;

				const projects = await repos.projects.selectIds({
					pathogenIds: [pathogen.id],
					state: "active",
					lock: true,
				});
				const studies = await repos.studies.selectIds({ projectIds: projects, state: "active" });
				return { pathogens: [pathogen.id], projects, studies };
			}
			case "project": {
				const project = await repos.projects.findById(target.id, {
					includeDeleted: true,
					lock: "update",
				});
				if (!project) throw new NotFoundError("project", target.id);
				if (project.deletedAt) return EMPTY;

				const studies = await repos.studies.selectIds({
					projectIds: [project.id],
					state: "active",
				});
				return { pathogens: [], projects: [project.id], studies };
			}
			case "study": {
				const study = await repos.studies.findById(target.id, { includeDeleted: true });
				if (!study) throw new NotFoundError("study", target.id);
				if (study.deletedAt) return EMPTY;
				return { pathogens: [], projects: [], studies: [study.id] };
			}
			case "organisation":
			case "user": {
				const projects = await repos.projects.selectIds(
					target.kind === "organisation"
						? { organisationId: target.organisationId, state: "active", lock: true }
						: { userId: target.userId, state: "active", lock: true },
				);
				const studies = await repos.studies.selectIds({ projectIds: projects, state: "active" });
				return { pathogens: [], projects, studies };
			}
			case "all":
				return {
					pathogens: await repos.pathogens.selectIds({ state: "active", lock: true }),
					projects: await repos.projects.selectIds({ state: "active", lock: true }),
					studies: await repos.studies.selectIds({ state: "active" }),
				};
		}
	}

	// ===========================================================================
	// Restore
	// ===========================================================================

	/**
	 * Clear `deleted_at` on one row. With `cascade`, descendants that carry
	 * the same `deleted_at` are restored too. A row that is not deleted
	 * yields zero counts.
	 *
	 * @throws InvalidReferenceError when restoring a study whose project is deleted
	 */
	async restore(kind: EntityKind, id: string, options: RestoreOptions = {}): Promise<EntityCounts> {
		const summary = await this.store.transaction(async (repos) => {
			const ids = await this.collectRestore(repos, kind, id, options.cascade ?? false);
			return {
				pathogens: await repos.pathogens.restore(ids.pathogens),
				projects: await repos.projects.restore(ids.projects),
				studies: await repos.studies.restore(ids.studies),
			};
		});

		this.logger.info({ target: kind, id, cascade: options.cascade ?? false, ...summary }, "Restore applied");
		return summary;
	}

	private async collectRestore(
		repos: Repositories,
		kind: EntityKind,
		id: string,
		cascade: boolean,
	): Promise<IdSet> {
		switch (kind) {
			case "pathogen": {
				const pathogen = await repos.pathogens.findById(id, { includeDeleted: true });
				if (!pathogen) throw new NotFoundError("pathogen", id);
				if (!pathogen.deletedAt) return EMPTY;
				if (!cascade) return { pathogens: [id], projects: [], studies: [] };

				const deletedAt = pathogen.deletedAt;
				const projects = await repos.projects.selectIds({ pathogenIds: [id], deletedAt });
				const studies = await repos.studies.selectIds({ projectIds: projects, deletedAt });
				return { pathogens: [id], projects, studies };
			}
			case "project": {
				const project = await repos.projects.findById(id, { includeDeleted: true });
				if (!project) throw new NotFoundError("project", id);
				if (!project.deletedAt) return EMPTY;
				if (!cascade) return { pathogens: [], projects: [id], studies: [] };

				const studies = await repos.studies.selectIds({
					projectIds: [id],
					deletedAt: project.deletedAt,
				});
				return { pathogens: [], projects: [id], studies };
			}
			case "study": {
				const study = await repos.studies.findById(id, { includeDeleted: true });
				if (!study) throw new NotFoundError("study", id);
				if (!study.deletedAt) return EMPTY;

				const project = await repos.projects.findById(study.projectId, { includeDeleted: true });
				if (!project || project.deletedAt) {
					throw new InvalidReferenceError(
						"project",
						study.projectId,
						`cannot restore study '${id}': project '${study.projectId}' is deleted`,
					);
				}
				return { pathogens: [], projects: [], studies: [id] };
			}
		}
	}

	// ===========================================================================
	// Purge
	// ===========================================================================

	previewPurge(scope: PurgeScope): Promise<PurgePreview> {
		return this.store.transaction(async (repos) => {
			const closure = await this.purgeClosure(repos, scope);
			return { toDelete: counts(closure), blockers: counts(await this.activeIn(repos, closure)) };
		});
	}

	/**
	 * Hard-delete the soft-deleted rows in scope, together with every row
	 * that would otherwise be removed or orphaned.
	 *
	 * @throws PurgeBlockedError if any row in that closure is active; nothing is deleted
	 */
	async purge(scope: PurgeScope): Promise<EntityCounts> {
		const { summary, slugs } = await this.store.transaction(async (repos) => {
			const closure = await this.purgeClosure(repos, scope);
			const active = counts(await this.activeIn(repos, closure));
			if (active.pathogens + active.projects + active.studies > 0) {
				throw new PurgeBlockedError(active);
			}

			const slugs = await this.slugsOf(repos, closure.projects);
			return {
				slugs,
				summary: {
					studies: await repos.studies.hardDelete(closure.studies),
					projects: await repos.projects.hardDelete(closure.projects),
					pathogens: await repos.pathogens.hardDelete(closure.pathogens),
				},
			};
		});

		this.logger.warn({ ...targetFields(scope), ...summary }, "Purge applied");
		await this.releaseSlugs(slugs);
		return summary;
	}

	private async purgeClosure(repos: Repositories, scope: PurgeScope): Promise<IdSet> {
		const selected = await this.selectPurge(repos, scope);

		const projects = union(
			selected.projects,
			selected.pathogens.length > 0
				? await repos.projects.selectIds({ pathogenIds: selected.pathogens })
				: [],
		);
		const studies = union(
			selected.studies,
			projects.length > 0 ? await repos.studies.selectIds({ projectIds: projects }) : [],
		);

		return { pathogens: selected.pathogens, projects, studies };
	}

	private async selectPurge(repos: Repositories, scope: PurgeScope): Promise<IdSet> {
		switch (scope.kind) {
			case "all":
				return {
					pathogens: await repos.pathogens.selectIds({ state: "deleted" }),
					projects: await repos.projects.selectIds({ state: "deleted" }),
					studies: await repos.studies.selectIds({ state: "deleted" }),
				};
			case "pathogen":
				if (!(await repos.pathogens.findById(scope.id, { includeDeleted: true }))) {
					throw new NotFoundError("pathogen", scope.id);
				}
				return { pathogens: [scope.id], projects: [], studies: [] };
			case "project":
				if (!(await repos.projects.findById(scope.id, { includeDeleted: true }))) {
					throw new NotFoundError("project", scope.id);
				}
				return { pathogens: [], projects: [scope.id], studies: [] };
			case "study":
				if (!(await repos.studies.findById(scope.id, { includeDeleted: true }))) {
					throw new NotFoundError("study", scope.id);
				}
				return { pathogens: [], projects: [], studies: [scope.id] };
			case "organisation":
				return {
					pathogens: [],
					projects: await repos.projects.selectIds({ organisationId: scope.organisationId }),
					studies: [],
				};
			case "user":
				return {
					pathogens: [],
					projects: await repos.projects.selectIds({ userId: scope.userId }),
					studies: [],
				};
		}
	}

	private async activeIn(repos: Repositories, ids: IdSet): Promise<IdSet> {
		return {
			pathogens: await repos.pathogens.selectIds({ ids: ids.pathogens, state: "active" }),
			projects: await repos.projects.selectIds({ ids: ids.projects, state: "active" }),
			studies: await repos.studies.selectIds({ ids: ids.studies, state: "active" }),
		};
	}

	// ===========================================================================
	// Wipe
	// ===========================================================================

	/** Total rows a wipe would remove */
	previewWipe(): Promise<EntityCounts> {
		return this.store.transaction(async (repos) => ({
			pathogens: await repos.pathogens.count("all"),
			projects: await repos.projects.count("all"),
			studies: await repos.studies.count("all"),
		}));
	}

	/**
	 * Delete every row in dependency order.
	 *
	 * @throws ConfirmationRequiredError unless `phrase` is exactly "WIPE ALL DATA"
	 */
	async wipe(phrase: string | undefined): Promise<EntityCounts> {
		assertConfirmation("wipe", phrase);

		const { summary, slugs } = await this.store.transaction(async (repos) => {
			const slugs = await this.slugsOf(repos, await repos.projects.selectIds({}));
			return {
				slugs,
				summary: {
					studies: await repos.studies.deleteAll(),
					projects: await repos.projects.deleteAll(),
					pathogens: await repos.pathogens.deleteAll(),
				},
			};
		});

		this.logger.warn(summary, "Wipe applied");
		await this.releaseSlugs(slugs);
		return summary;
	}

	// ===========================================================================
	// Deprovisioning
	// ===========================================================================

	private async slugsOf(repos: Repositories, projectIds: readonly string[]): Promise<string[]> {
		if (!this.deprovisioner) {
			return [];
		}
		const slugs = new Set<string>();
		for (const id of projectIds) {
			const project = await repos.projects.findById(id, { includeDeleted: true });
			if (project) {
				slugs.add(project.slug);
			}
		}
		return [...slugs];
	}

	/**
	 * Remove the graph of each slug no remaining row holds. Under active-rows
	 * uniqueness a purged slug may still belong to a live project.
	 */
	private async releaseSlugs(slugs: readonly string[]): Promise<void> {
		const deprovisioner = this.deprovisioner;
		if (!deprovisioner) {
			return;
		}

		for (const slug of slugs) {
			const holder = await this.store.transaction((repos) =>
				repos.projects.findBySlug(slug, { includeDeleted: true }),
			);
			if (holder) {
				continue;
			}
			try {
				await deprovisioner.deprovision(slug);
			} catch (error) {
				withProjectContext(this.logger, { slug }).error(
					{ err: toError(error) },
					"Deprovisioning failed, identity-provider objects left behind",
				);
			}
		}
	}
}
