import { ConflictError, InvalidReferenceError, NotFoundError } from "@folio/common";
import type { EntityStore, ReadOptions, Repositories } from "../repositories";
import type { CreateStudyInput, Study, StudyFilter, UpdateStudyInput } from "../types";
import {
	assertDateOrder,
	createStudySchema,
	parseInput,
	updateStudySchema,
} from "../validation";
import type { EntityServiceOptions } from "./pathogens";

export class StudyService {
	constructor(
		private readonly store: EntityStore,
		private readonly options: EntityServiceOptions,
	) {}

	async create(input: CreateStudyInput): Promise<Study> {
		const data = parseInput(createStudySchema, input);
		assertDateOrder(data.startDate, data.endDate);

		const study = await this.store.transaction(async (repos) => {
			await this.assertProjectVisible(repos, data.projectId);

			const existing = await repos.studies.findByStudyId(data.studyId, { includeDeleted: true });
			if (existing && (this.options.uniquenessScope === "all-rows" || existing.deletedAt === null)) {
				throw new ConflictError("study", "study_id", data.studyId);
			}

			return repos.studies.insert(data);
		});

		this.options.logger.info(
			{ studyId: study.studyId, projectId: study.projectId },
			"Study created",
		);
		return study;
	}

	async get(id: string, options: ReadOptions = {}): Promise<Study> {
		const study = await this.store.transaction((repos) => repos.studies.findById(id, options));
		if (!study) {
			throw new NotFoundError("study", id);
		}
		return study;
	}

	list(filter: StudyFilter = {}): Promise<Study[]> {
		return this.store.transaction((repos) => repos.studies.list(filter));
	}

	async update(id: string, input: UpdateStudyInput): Promise<Study> {
		const data = parseInput(updateStudySchema, input);

		return this.store.transaction(async (repos) => {
			const current = await repos.studies.findById(id);
			if (!current) {
				throw new NotFoundError("study", id);
			}

			assertDateOrder(
				data.startDate !== undefined ? data.startDate : current.startDate,
				data.endDate !== undefined ? data.endDate : current.endDate,
			);
			if (data.projectId !== undefined && data.projectId !== current.projectId) {
				await this.assertProjectVisible(repos, data.projectId);
			}

			const updated = await repos.studies.update(id, data);
			if (!updated) {
				throw new NotFoundError("study", id);
			}
			return updated;
		});
	}

	private async assertProjectVisible(repos: Repositories, projectId: string): Promise<void> {
		if (!(await repos.projects.findById(projectId, { lock: "share" }))) {
			throw new InvalidReferenceError("project", projectId);
		}
	}
}
