/**
 * Input schemas shared by the services and the HTTP API.
 *
 * @module @folio/core/validation
 */

import { ValidationError } from "@folio/common";
import { z } from "zod";

export const SLUG_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/;
export const STUDY_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

export const slugSchema = z
	.string()
	.min(2)
	.max(64)
	.regex(SLUG_PATTERN, "must be lowercase alphanumerics separated by single hyphens");

export const studyIdSchema = z
	.string()
	.min(1)
	.max(255)
	.regex(STUDY_ID_PATTERN, "may contain letters, digits, '_', '-' and '.' only");

export const isoDateSchema = z
	.string()
	.regex(/^\d{4}-\d{2}-\d{2}$/, "must be an ISO date (YYYY-MM-DD)")
	.refine(
		(value) => {
			const date = new Date(`${value}T00:00:00Z`);
			return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value);
		},
		{ message: "is not a calendar date" },
	);

export const privacySchema = z.enum(["public", "private"]);
export const entityStateSchema = z.enum(["active", "deleted", "all"]);

const nameSchema = z.string().trim().min(1).max(255);
const textSchema = z.string().nullish();

export const createPathogenSchema = z
	.object({
		name: nameSchema,
		scientificName: z.string().max(255).nullish(),
		description: textSchema,
		taxonomyId: z.number().int().positive().nullish(),
	})
	.strict();

export const updatePathogenSchema = createPathogenSchema.partial().strict();

export const createProjectSchema = z
	.object({
		slug: slugSchema,
		name: nameSchema,
		description: textSchema,
		organisationId: z.string().min(1).max(255),
		userId: z.string().min(1).max(255),
		privacy: privacySchema.optional(),
		pathogenId: z.string().uuid().nullish(),
	})
	.strict();

/** `slug` is deliberately absent: it never changes after creation */
export const updateProjectSchema = z
	.object({
		name: nameSchema,
		description: textSchema,
		organisationId: z.string().min(1).max(255),
		privacy: privacySchema,
		pathogenId: z.string().uuid().nullable(),
	})
	.partial()
	.strict();

export const createStudySchema = z
	.object({
		studyId: studyIdSchema,
		name: nameSchema,
		description: textSchema,
		projectId: z.string().uuid(),
		startDate: isoDateSchema.nullish(),
		endDate: isoDateSchema.nullish(),
	})
	.strict();

export const updateStudySchema = z
	.object({
		name: nameSchema,
		description: textSchema,
		projectId: z.string().uuid(),
		startDate: isoDateSchema.nullable(),
		endDate: isoDateSchema.nullable(),
	})
	.partial()
	.strict();

/**
 * Parse input against a schema, raising ValidationError with one line per
 * issue.
 */
export function parseInput<O, I>(schema: z.ZodType<O, z.ZodTypeDef, I>, input: unknown): O {
	const result = schema.safeParse(input);
	if (result.success) {
		return result.data;
	}

	const issues = result.error.issues.map(
		(issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
	);
	const field = result.error.issues[0]?.path.join(".") || undefined;
	throw new ValidationError(`invalid input: ${issues.join("; ")}`, field, issues, result.error);
}

/**
 * Reject a start date after the end date; either may be absent.
 */
export function assertDateOrder(
	startDate: string | null | undefined,
	endDate: string | null | undefined,
): void {
	if (startDate && endDate && startDate > endDate) {
		throw new ValidationError(
			`start_date ${startDate} is after end_date ${endDate}`,
			"endDate",
		);
	}
}
