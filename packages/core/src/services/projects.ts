import {
	ConflictError,
	InvalidReferenceError,
	NotFoundError,
	toError,
	ValidationError,
} from "@folio/common";
import { withProjectContext } from "@folio/logger";
import type { EntityStore, ReadOptions, Repositories } from "../repositories";
import type {
	CreateProjectInput,
	Project,
	ProjectFilter,
	UpdateProjectInput,
} from "../types";
import { createProjectSchema, parseInput, updateProjectSchema } from "../validation";
import type { EntityServiceOptions } from "./pathogens";
import type { ProvisioningResult, ProvisionOptions, Provisioner } from "./provisioning";

export class ProjectService {
	constructor(
		private readonly store: EntityStore,
		private readonly provisioner: Provisioner,
		private readonly options: EntityServiceOptions,
	) {}

	/**
	 * Create a project and its authorization graph. The row is inserted
	 * first, holding the slug, and committed only once provisioning has
	 * succeeded.
	 *
	 * If the commit itself fails after provisioning, the graph is rolled
	 * back and the commit error is rethrown.
	 *
	 * @throws ConflictError before any identity-provider call when the slug is taken
	 * @throws ProvisioningFailedError when the saga aborts; no row is left behind
	 */
	async create(input: CreateProjectInput, options: ProvisionOptions = {}): Promise<Project> {
		const data = parseInput(createProjectSchema, input);
		const graph: { current?: ProvisioningResult } = {};

		let project: Project;
		try {
			project = await this.store.transaction(async (repos) => {
				await this.assertPathogenVisible(repos, data.pathogenId);

				const existing = await repos.projects.findBySlug(data.slug, { includeDeleted: true });
				if (existing && (this.options.uniquenessScope === "all-rows" || existing.deletedAt === null)) {
					throw new ConflictError("project", "slug", data.slug);
				}

				const inserted = await repos.projects.insert(data);
				graph.current = await this.provisioner.provision(inserted, options);
				return inserted;
			});
		} catch (error) {
			if (graph.current) {
				const failures = await graph.current.rollback();
				withProjectContext(this.options.logger, { slug: data.slug }).error(
					{ err: toError(error), compensationFailures: failures },
					"Project insert failed after provisioning, authorization rolled back",
				);
			}
			throw error;
		}

		withProjectContext(this.options.logger, { projectId: project.id, slug: project.slug }).info(
			{ organisationId: project.organisationId, userId: project.userId },
			"Project created",
		);
		return project;
	}

	async get(id: string, options: ReadOptions = {}): Promise<Project> {
		const project = await this.store.transaction((repos) => repos.projects.findById(id, options));
		if (!project) {
			throw new NotFoundError("project", id);
		}
		return project;
	}

	async getBySlug(slug: string, options: ReadOptions = {}): Promise<Project> {
		const project = await this.store.transaction((repos) =>
			repos.projects.findBySlug(slug, options),
		);
		if (!project) {
			throw new NotFoundError("project", slug);
		}
		return project;
	}

	list(filter: ProjectFilter = {}): Promise<Project[]> {
		return this.store.transaction((repos) => repos.projects.list(filter));
	}

	/**
	 * @throws ValidationError when the input names `slug`
	 */
	async update(id: string, input: UpdateProjectInput): Promise<Project> {
		if ("slug" in input) {
			throw new ValidationError("slug is immutable", "slug");
		}
		const data = parseInput(updateProjectSchema, input);

		return this.store.transaction(async (repos) => {
			const current = await repos.projects.findById(id);
			if (!current) {
				throw new NotFoundError("project", id);
			}
			if (data.pathogenId !== undefined && data.pathogenId !== current.pathogenId) {
				await this.assertPathogenVisible(repos, data.pathogenId);
			}

			const updated = await repos.projects.update(id, data);
			if (!updated) {
				throw new NotFoundError("project", id);
			}
			return updated;
		});
	}

	private async assertPathogenVisible(
		repos: Repositories,
		pathogenId: string | null | undefined,
	): Promise<void> {
		if (pathogenId && !(await repos.pathogens.findById(pathogenId, { lock: "share" }))) {
			throw new InvalidReferenceError("pathogen", pathogenId);
		}
	}
}
