import { z } from "zod";
import { SchemaVersionError } from "../lib/errors";

export const SCRIPT_SCHEMA_VERSION = "0.1";

export const SUPPORTED_SCHEMA_VERSIONS: readonly string[] = [SCRIPT_SCHEMA_VERSION];

/** Required top-level sections, in document order. */
export const SCRIPT_SECTIONS = [
	"metadata",
	"intro",
	"explanation",
	"practice_mcq",
	"summary",
] as const;

export type ScriptSection = (typeof SCRIPT_SECTIONS)[number];

export const MCQ_OPTION_COUNT = 4;

export type ViolationRule =
	| "required"
	| "type"
	| "non_empty"
	| "length"
	| "distinct"
	| "range"
	| "integer"
	| "version"
	| "unexpected";

export interface Violation {
	path: string;
	rule: ViolationRule;
	message: string;
}

const nonEmptyText = () =>
	z.string().superRefine((value, ctx) => {
		if (value.trim().length === 0) {
			ctx.addIssue({
				code: "custom",
				message: "must not be empty",
				params: { rule: "non_empty" },
			});
		}
	});

const NarratedSectionSchema = z.object({
	title: z.string(),
	narration: nonEmptyText(),
});

const OptionsSchema = z
	.array(nonEmptyText())
	.length(MCQ_OPTION_COUNT, `must contain exactly ${MCQ_OPTION_COUNT} options`)
	.superRefine((options, ctx) => {
		const seen = new Set<string>();
		options.forEach((option, index) => {
			if (seen.has(option)) {
				ctx.addIssue({
					code: "custom",
					path: [index],
					message: `duplicates an earlier option ("${option}")`,
					params: { rule: "distinct" },
				});
			}
			seen.add(option);
		});
	});

const PracticeMcqSchema = z
	.object({
		title: z.string(),
		question: nonEmptyText(),
		options: OptionsSchema,
		correct_answer: z.number(),
		explanation: nonEmptyText(),
	})
	.superRefine((mcq, ctx) => {
		const answer = mcq.correct_answer;
		if (!Number.isInteger(answer)) {
			ctx.addIssue({
				code: "custom",
				path: ["correct_answer"],
				message: `must be an integer index, got ${answer}`,
				params: { rule: "integer" },
			});
		} else if (answer < 0 || answer >= mcq.options.length) {
			ctx.addIssue({
				code: "custom",
				path: ["correct_answer"],
				message: `index ${answer} is outside [0, ${mcq.options.length})`,
				params: { rule: "range" },
			});
		}
	});

function metadataSchema<V extends string>(version: V) {
	return z.object({
		version: z.literal(version),
		language: nonEmptyText(),
		tone: nonEmptyText(),
		topic: nonEmptyText(),
		duration_estimate: z.number().min(0, "must be non-negative"),
	});
}

function scriptShape<V extends string>(version: V) {
	return {
		metadata: metadataSchema(version),
		intro: NarratedSectionSchema,
		explanation: NarratedSectionSchema,
		practice_mcq: PracticeMcqSchema,
		summary: NarratedSectionSchema,
	};
}

/** The v0.1 contract with unknown top-level sections rejected. */
export const ScriptDocumentSchema = z.strictObject(
	scriptShape(SCRIPT_SCHEMA_VERSION),
);

export type ScriptDocument = z.infer<typeof ScriptDocumentSchema>;
export type ScriptMetadata = ScriptDocument["metadata"];
export type PracticeMcq = ScriptDocument["practice_mcq"];

export interface ScriptSchemaOptions {
	/** Treat unexpected top-level sections as violations instead of stripping them. */
	rejectUnknownSections: boolean;
}

export const DEFAULT_SCHEMA_OPTIONS: ScriptSchemaOptions = {
	rejectUnknownSections: true,
};

/**
 * Returns the schema for a version tag. Throws SchemaVersionError for any tag
 * this build does not know, so a validator is never run against the wrong contract.
 */
export function getScriptSchema(
	version: string,
	options: ScriptSchemaOptions = DEFAULT_SCHEMA_OPTIONS,
): z.ZodType<ScriptDocument> {
	if (version !== SCRIPT_SCHEMA_VERSION) {
		throw new SchemaVersionError(version, SUPPORTED_SCHEMA_VERSIONS);
	}
	return options.rejectUnknownSections
		? ScriptDocumentSchema
		: z.object(scriptShape(SCRIPT_SCHEMA_VERSION));
}

export interface NarrationSegment {
	key: string;
	section: Exclude<ScriptSection, "metadata">;
	field: string;
	text(document: ScriptDocument): string;
}

/** Fields read aloud, in playback order. */
export const NARRATION_SEGMENTS: readonly NarrationSegment[] = [
	{
		key: "intro_narration",
		section: "intro",
		field: "narration",
		text: (doc) => doc.intro.narration,
	},
	{
		key: "explanation_narration",
		section: "explanation",
		field: "narration",
		text: (doc) => doc.explanation.narration,
	},
	{
		key: "practice_mcq_question",
		section: "practice_mcq",
		field: "question",
		text: (doc) => doc.practice_mcq.question,
	},
	{
		key: "practice_mcq_explanation",
		section: "practice_mcq",
		field: "explanation",
		text: (doc) => doc.practice_mcq.explanation,
	},
	{
		key: "summary_narration",
		section: "summary",
		field: "narration",
		text: (doc) => doc.summary.narration,
	},
];
