/**
 * Request and response shapes of the HTTP API. The wire format is
 * snake_case; handlers map it onto the camelCase service inputs. Keys left
 * out of a PATCH body arrive as undefined and leave their column alone.
 */

import type {
	CreatePathogenInput,
	CreateStudyInput,
	Pathogen,
	Project,
	ProjectDetails,
	Study,
	StudyDetails,
	UpdatePathogenInput,
	UpdateProjectInput,
	UpdateStudyInput,
} from "@folio/core";
import { type EntityCounts, toError, ValidationError } from "@folio/common";
import { entityStateSchema, parseInput, privacySchema } from "@folio/core";
import type { Context } from "hono";
import { z } from "zod";

// =============================================================================
// Request bodies
// =============================================================================

export const CreatePathogenBody = z
	.object({
		name: z.string(),
		scientific_name: z.string().nullish(),
		description: z.string().nullish(),
		taxonomy_id: z.number().nullish(),
	})
	.strict()
	.transform(
		(b): CreatePathogenInput => ({
			name: b.name,
			scientificName: b.scientific_name,
			description: b.description,
			taxonomyId: b.taxonomy_id,
		}),
	);

export const UpdatePathogenBody = z
	.object({
		name: z.string().optional(),
		scientific_name: z.string().nullish(),
		description: z.string().nullish(),
		taxonomy_id: z.number().nullish(),
	})
	.strict()
	.transform(
		(b): UpdatePathogenInput =>
			({
				name: b.name,
				scientificName: b.scientific_name,
				description: b.description,
				taxonomyId: b.taxonomy_id,
			}),
	);

/** `user_id` defaults to the caller */
export const CreateProjectBody = z
	.object({
		slug: z.string(),
		name: z.string(),
		description: z.string().nullish(),
		organisation_id: z.string(),
		user_id: z.string().optional(),
		privacy: privacySchema.optional(),
		pathogen_id: z.string().nullish(),
	})
	.strict();

export const UpdateProjectBody = z
	.object({
		name: z.string().optional(),
		description: z.string().nullish(),
		organisation_id: z.string().optional(),
		privacy: privacySchema.optional(),
		pathogen_id: z.string().nullish(),
	})
	.strict()
	.transform(
		(b): UpdateProjectInput =>
			({
				name: b.name,
				description: b.description,
				organisationId: b.organisation_id,
				privacy: b.privacy,
				pathogenId: b.pathogen_id,
			}),
	);

export const CreateStudyBody = z
	.object({
		study_id: z.string(),
		name: z.string(),
		description: z.string().nullish(),
		project_id: z.string(),
		start_date: z.string().nullish(),
		end_date: z.string().nullish(),
	})
	.strict()
	.transform(
		(b): CreateStudyInput => ({
			studyId: b.study_id,
			name: b.name,
			description: b.description,
			projectId: b.project_id,
			startDate: b.start_date,
			endDate: b.end_date,
		}),
	);

export const UpdateStudyBody = z
	.object({
		name: z.string().optional(),
		description: z.string().nullish(),
		project_id: z.string().optional(),
		start_date: z.string().nullish(),
		end_date: z.string().nullish(),
	})
	.strict()
	.transform(
		(b): UpdateStudyInput =>
			({
				name: b.name,
				description: b.description,
				projectId: b.project_id,
				startDate: b.start_date,
				endDate: b.end_date,
			}),
	);

// =============================================================================
// Query strings
// =============================================================================

const page = {
	state: entityStateSchema.optional(),
	limit: z.coerce.number().int().min(1).max(1000).optional(),
	offset: z.coerce.number().int().min(0).optional(),
};

export const PathogenQuery = z.object(page);

export const ProjectQuery = z.object({
	...page,
	organisation_id: z.string().optional(),
	user_id: z.string().optional(),
	privacy: privacySchema.optional(),
	pathogen_id: z.string().optional(),
});

export const StudyQuery = z.object({
	...page,
	project_id: z.string().optional(),
	organisation_id: z.string().optional(),
	user_id: z.string().optional(),
});

export const ReadQuery = z.object({
	include_deleted: z.enum(["true", "false"]).optional(),
});

export const RestoreQuery = z.object({
	cascade: z.enum(["true", "false"]).optional(),
});

// =============================================================================
// Responses
// =============================================================================

function iso(date: Date | null): string | null {
	return date ? date.toISOString() : null;
}

export function pathogenToWire(p: Pathogen) {
	return {
		id: p.id,
		name: p.name,
		scientific_name: p.scientificName,
		description: p.description,
		taxonomy_id: p.taxonomyId,
		created_at: iso(p.createdAt),
		updated_at: iso(p.updatedAt),
		deleted_at: iso(p.deletedAt),
	};
}

export function projectToWire(p: Project) {
	return {
		id: p.id,
		slug: p.slug,
		name: p.name,
		description: p.description,
		organisation_id: p.organisationId,
		user_id: p.userId,
		privacy: p.privacy,
		pathogen_id: p.pathogenId,
		created_at: iso(p.createdAt),
		updated_at: iso(p.updatedAt),
		deleted_at: iso(p.deletedAt),
	};
}

export function studyToWire(s: Study) {
	return {
		id: s.id,
		study_id: s.studyId,
		name: s.name,
		description: s.description,
		project_id: s.projectId,
		start_date: s.startDate,
		end_date: s.endDate,
		created_at: iso(s.createdAt),
		updated_at: iso(s.updatedAt),
		deleted_at: iso(s.deletedAt),
	};
}

export function projectDetailsToWire(r: ProjectDetails) {
	return {
		id: r.id,
		slug: r.slug,
		name: r.name,
		description: r.description,
		organisation_id: r.organisationId,
		user_id: r.userId,
		privacy: r.privacy,
		pathogen_name: r.pathogenName,
		pathogen_scientific_name: r.pathogenScientificName,
		study_count: r.studyCount,
		created_at: iso(r.createdAt),
		updated_at: iso(r.updatedAt),
	};
}

export function studyDetailsToWire(r: StudyDetails) {
	return {
		id: r.id,
		study_id: r.studyId,
		name: r.name,
		description: r.description,
		start_date: r.startDate,
		end_date: r.endDate,
		project_slug: r.projectSlug,
		project_name: r.projectName,
		pathogen_name: r.pathogenName,
		created_at: iso(r.createdAt),
		updated_at: iso(r.updatedAt),
	};
}

export function countsToWire(c: EntityCounts) {
	return { pathogens: c.pathogens, projects: c.projects, studies: c.studies };
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a JSON request body against one of the body schemas.
 *
 * @throws ValidationError for malformed JSON or a body the schema rejects
 */
export async function readBody<O, I>(c: Context, schema: z.ZodType<O, z.ZodTypeDef, I>): Promise<O> {
	let body: unknown;
	try {
		body = await c.req.json();
	} catch (error) {
		throw new ValidationError("request body must be a JSON object", undefined, [], toError(error));
	}
	return parseInput(schema, body);
}

export function readQuery<O, I>(c: Context, schema: z.ZodType<O, z.ZodTypeDef, I>): O {
	return parseInput(schema, c.req.query());
}
