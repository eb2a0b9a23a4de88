import { z } from "zod";
import { HASH_FUNCTIONS, MARKER_FORMS, type MultibustRule } from "./types.js";

/** A static or code directory: a bare path or a path with include/exclude globs */
export const rootEntrySchema = z.union([
	z.string().min(1, "Directory path must not be empty"),
	z
		.object({
			path: z.string().min(1, "Directory path must not be empty"),
			include: z.array(z.string().min(1)).optional(),
			exclude: z.array(z.string().min(1)).optional(),
		})
		.strict(),
]);

export type RootEntry = z.infer<typeof rootEntrySchema>;

const valuesSchema = z.array(z.string()).min(1, "Substitution list must not be empty");

/**
 * Multibust rules, either as `{ "{{lang}}": ["en", "de"] }` or as
 * `[{ "placeholder": "{{lang}}", "values": ["en", "de"] }]`.
 * The array form is the only one where a duplicate placeholder survives JSON parsing.
 */
export const multibustSchema = z
	.union([
		z.record(z.string().min(1, "Placeholder must not be empty"), valuesSchema),
		z.array(
			z
				.object({
					placeholder: z.string().min(1, "Placeholder must not be empty"),
					values: valuesSchema,
				})
				.strict(),
		),
	])
	.superRefine((value, ctx) => {
		// record keys are unique already; only the array form can repeat a placeholder
		if (!Array.isArray(value)) return;
		const seen = new Set<string>();
		for (const rule of value) {
			if (seen.has(rule.placeholder)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Duplicate placeholder "${rule.placeholder}"`,
				});
			}
			seen.add(rule.placeholder);
		}
	})
	.transform((value): MultibustRule[] =>
		Array.isArray(value)
			? value.map((rule) => ({ placeholder: rule.placeholder, values: [...rule.values] }))
			: Object.entries(value).map(([placeholder, values]) => ({ placeholder, values: [...values] })),
	);

const filetypesSchema = z.array(z.string().regex(/^(\*?\.)?[A-Za-z0-9_-]+$/, "Filetype must look like \"png\" or \".png\"")).min(1);

/** Shape of static-bust.jsonc (after comments are stripped) */
export const configFileSchema = z
	.object({
		staticDirs: z.array(rootEntrySchema).min(1, "At least one static directory is required"),
		codeDirs: z.array(rootEntrySchema).min(1, "At least one code directory is required"),
		staticFiletypes: filetypesSchema.optional(),
		codeFiletypes: filetypesSchema.optional(),
		ignoreDirs: z.array(z.string().min(1)).optional(),
		markerForm: z.enum(MARKER_FORMS).optional(),
		markerToken: z
			.string()
			.regex(/^[A-Za-z0-9_-]+$/, "Marker token may only contain letters, digits, '_' and '-'")
			.optional(),
		multibust: multibustSchema.optional(),
		hashFunction: z.enum(HASH_FUNCTIONS).optional(),
		hashLength: z.number().int().min(4).max(32).optional(),
		maxFileSize: z.number().int().positive().optional(),
		delimiters: z.string().min(1).optional(),
		concurrency: z.number().int().min(1).max(64).optional(),
	})
	.strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
