import { ConflictError, NotFoundError } from "@folio/common";
import type { Logger } from "@folio/logger";
import type { EntityStore, ReadOptions } from "../repositories";
import type {
	CreatePathogenInput,
	Pathogen,
	PathogenFilter,
	UniquenessScope,
	UpdatePathogenInput,
} from "../types";
import { createPathogenSchema, parseInput, updatePathogenSchema } from "../validation";

export interface EntityServiceOptions {
	uniquenessScope: UniquenessScope;
	logger: Logger;
}

export class PathogenService {
	constructor(
		private readonly store: EntityStore,
		private readonly options: EntityServiceOptions,
	) {}

	async create(input: CreatePathogenInput): Promise<Pathogen> {
		const data = parseInput(createPathogenSchema, input);

		const pathogen = await this.store.transaction(async (repos) => {
			const existing = await repos.pathogens.findByName(data.name, { includeDeleted: true });
			if (existing && (this.options.uniquenessScope === "all-rows" || existing.deletedAt === null)) {
				throw new ConflictError("pathogen", "name", data.name);
			}
			return repos.pathogens.insert(data);
		});

		this.options.logger.info({ pathogenId: pathogen.id, name: pathogen.name }, "Pathogen created");
		return pathogen;
	}

	async get(id: string, options: ReadOptions = {}): Promise<Pathogen> {
		const pathogen = await this.store.transaction((repos) => repos.pathogens.findById(id, options));
		if (!pathogen) {
			throw new NotFoundError("pathogen", id);
		}
		return pathogen;
	}

	list(filter: PathogenFilter = {}): Promise<Pathogen[]> {
		return this.store.transaction((repos) => repos.pathogens.list(filter));
	}

	async update(id: string, input: UpdatePathogenInput): Promise<Pathogen> {
		const data = parseInput(updatePathogenSchema, input);

		return this.store.transaction(async (repos) => {
			const current = await repos.pathogens.findById(id);
			if (!current) {
				throw new NotFoundError("pathogen", id);
			}

			if (data.name !== undefined && data.name !== current.name) {
				const existing = await repos.pathogens.findByName(data.name, { includeDeleted: true });
				if (
					existing &&
					(this.options.uniquenessScope === "all-rows" || existing.deletedAt === null)
				) {
					throw new ConflictError("pathogen", "name", data.name);
				}
			}

			const updated = await repos.pathogens.update(id, data);
			if (!updated) {
				throw new NotFoundError("pathogen", id);
			}
			return updated;
		});
	}
}
