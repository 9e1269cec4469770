import { type EntityKind, NotFoundError } from "@folio/common";
import type { EntityStore } from "../repositories";
import type {
	EntityState,
	OrganisationCount,
	Pathogen,
	Project,
	ProjectDetails,
	ProjectFilter,
	Study,
	StudyDetails,
	StudyFilter,
} from "../types";

export interface StateCounts {
	active: number;
	deleted: number;
	total: number;
}

export interface TableCounts {
	pathogens: StateCounts;
	projects: StateCounts;
	studies: StateCounts;
}

export type EntityInfo =
	| { kind: "pathogen"; pathogen: Pathogen; projects: Project[] }
	| { kind: "project"; project: Project; pathogen: Pathogen | null; studies: Study[] }
	| { kind: "study"; study: Study; project: Project | null };

/**
 * Read-only operator views. Counts use each row's own `deleted_at`.
 */
export class AdminService {
	constructor(private readonly store: EntityStore) {}

	listProjects(filter: ProjectFilter = {}): Promise<Project[]> {
		return this.store.transaction((repos) => repos.projects.list(filter));
	}

	counts(): Promise<TableCounts> {
		return this.store.transaction(async (repos) => {
			const tally = async (count: (state: EntityState) => Promise<number>) => {
				const active = await count("active");
				const deleted = await count("deleted");
				return { active, deleted, total: active + deleted };
			};

			return {
				pathogens: await tally((state) => repos.pathogens.count(state)),
				projects: await tally((state) => repos.projects.count(state)),
				studies: await tally((state) => repos.studies.count(state)),
			};
		});
	}

	countByOrganisation(): Promise<OrganisationCount[]> {
		return this.store.transaction((repos) => repos.projects.countByOrganisation());
	}

	/**
	 * One row with its neighbours, soft-deleted rows included.
	 */
	info(kind: EntityKind, id: string): Promise<EntityInfo> {
		return this.store.transaction(async (repos): Promise<EntityInfo> => {
			const all = { includeDeleted: true };

			switch (kind) {
				case "pathogen": {
					const pathogen = await repos.pathogens.findById(id, all);
					if (!pathogen) throw new NotFoundError("pathogen", id);
					return {
						kind,
						pathogen,
						projects: await repos.projects.list({ pathogenId: id, state: "all" }),
					};
				}
				case "project": {
					const project = await repos.projects.findById(id, all);
					if (!project) throw new NotFoundError("project", id);
					return {
						kind,
						project,
						pathogen: project.pathogenId
							? await repos.pathogens.findById(project.pathogenId, all)
							: null,
						studies: await repos.studies.list({ projectId: id, state: "all" }),
					};
				}
				case "study": {
					const study = await repos.studies.findById(id, all);
					if (!study) throw new NotFoundError("study", id);
					return {
						kind,
						study,
						project: await repos.projects.findById(study.projectId, all),
					};
				}
			}
		});
	}

	projectReport(filter: ProjectFilter = {}): Promise<ProjectDetails[]> {
		return this.store.transaction((repos) => repos.reports.projectDetails(filter));
	}

	studyReport(filter: StudyFilter = {}): Promise<StudyDetails[]> {
		return this.store.transaction((repos) => repos.reports.studyDetails(filter));
	}
}
