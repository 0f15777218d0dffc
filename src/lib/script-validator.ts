import type { z } from "zod";
import {
	DEFAULT_SCHEMA_OPTIONS,
	getScriptSchema,
	SCRIPT_SCHEMA_VERSION,
	type ScriptDocument,
	type ScriptSchemaOptions,
	type Violation,
	type ViolationRule,
} from "../schemas/script";
import { formatIssuePath } from "./validation";

export type ValidationResult =
	| { valid: true; document: ScriptDocument }
	| { valid: false; violations: Violation[] };

export interface ValidateOptions extends Partial<ScriptSchemaOptions> {
	version?: string;
}

type ZodIssue = z.ZodError["issues"][number];

const RULES: readonly ViolationRule[] = [
	"required",
	"type",
	"non_empty",
	"length",
	"distinct",
	"range",
	"integer",
	"version",
	"unexpected",
];

function isRule(value: unknown): value is ViolationRule {
	return RULES.some((rule) => rule === value);
}

function valueAt(candidate: unknown, path: ReadonlyArray<PropertyKey>): unknown {
	let current = candidate;
	for (const segment of path) {
		if (current === null || typeof current !== "object") return undefined;
		current = Reflect.get(current, segment);
	}
	return current;
}

function displayPath(path: ReadonlyArray<PropertyKey>): string {
	return path.length === 0 ? "(root)" : formatIssuePath(path);
}

function toViolations(issue: ZodIssue, candidate: unknown): Violation[] {
	const path = displayPath(issue.path);

	switch (issue.code) {
		case "invalid_type":
			return valueAt(candidate, issue.path) === undefined
				? [{ path, rule: "required", message: "is required" }]
				: [{ path, rule: "type", message: `expected ${issue.expected}` }];
		case "unrecognized_keys":
			return issue.keys.map((key) => ({
				path: formatIssuePath([...issue.path, key]),
				rule: "unexpected",
				message: `unexpected section "${key}"`,
			}));
		case "too_small":
		case "too_big":
			if (issue.origin === "array") {
				return [{ path, rule: "length", message: issue.message }];
			}
			if (issue.origin === "string") {
				return [{ path, rule: "non_empty", message: issue.message }];
			}
			return [{ path, rule: "range", message: issue.message }];
		case "invalid_value":
			return [
				{
					path,
					rule: "version",
					message: `must equal ${issue.values.map((v) => JSON.stringify(v)).join(" or ")}`,
				},
			];
		case "custom": {
			const rule: unknown = issue.params?.rule;
			return [{ path, rule: isRule(rule) ? rule : "type", message: issue.message }];
		}
		default:
			return [{ path, rule: "type", message: issue.message }];
	}
}

/**
 * Checks an untrusted candidate against the script schema. Total: any input
 * yields a result, and absent fields come back as `required` violations.
 * Throws only when the requested schema version is unknown.
 */
export function validateScript(
	candidate: unknown,
	options: ValidateOptions = {},
): ValidationResult {
	const schema = getScriptSchema(options.version ?? SCRIPT_SCHEMA_VERSION, {
		rejectUnknownSections:
			options.rejectUnknownSections ?? DEFAULT_SCHEMA_OPTIONS.rejectUnknownSections,
	});

	const result = schema.safeParse(candidate);
	if (result.success) {
		return { valid: true, document: result.data };
	}

	const violations = result.error.issues.flatMap((issue) =>
		toViolations(issue, candidate),
	);
	return { valid: false, violations };
}

export function formatViolation(violation: Violation): string {
	return `${violation.path}: ${violation.message} [${violation.rule}]`;
}

export function formatValidationReport(result: ValidationResult): string {
	const lines = ["Script validation report", "=".repeat(24)];

	if (result.valid) {
		lines.push(`PASSED: conforms to schema v${result.document.metadata.version}`);
		lines.push(`topic: ${result.document.metadata.topic}`);
		return lines.join("\n");
	}

	lines.push(`FAILED: ${result.violations.length} violation(s)`);
	result.violations.forEach((violation, index) => {
		lines.push(`  ${index + 1}. ${formatViolation(violation)}`);
	});
	return lines.join("\n");
}
