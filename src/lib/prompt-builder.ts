import { readdir, readFile } from "node:fs/promises";
import { extname, basename, join } from "node:path";
import { TemplateError, ValidationError } from "./errors";
import {
	DEFAULT_SCRIPT_TEMPLATE,
	SCRIPT_TEMPLATES,
	TEMPLATE_DOMAINS,
	type TemplateDomain,
} from "./prompts";

export type TemplateKey = TemplateDomain | "default";

const PLACEHOLDER = /\{\{\s*([a-zA-Z_]+)\s*\}\}/g;

export interface PromptVariables {
	language?: string;
	tone?: string;
}

/**
 * Substitutes the topic (and optional language/tone) into a template.
 * Pure: identical inputs always render the identical prompt.
 */
export function buildPrompt(
	topic: string,
	template: string,
	vars: PromptVariables = {},
): string {
	const trimmedTopic = topic.trim();
	if (!trimmedTopic) {
		throw new ValidationError("Topic must not be empty");
	}

	const names = [...template.matchAll(PLACEHOLDER)].map((m) => m[1]);
	if (!names.includes("topic")) {
		throw new TemplateError("Template is missing the {{topic}} placeholder", {
			placeholders: names,
		});
	}

	const values: Record<string, string | undefined> = {
		topic: trimmedTopic,
		language: vars.language,
		tone: vars.tone,
	};

	const unresolved = names.filter((name) => values[name] === undefined);
	if (unresolved.length > 0) {
		throw new TemplateError(
			`Template has unresolved placeholders: ${[...new Set(unresolved)].join(", ")}`,
			{ unresolved: [...new Set(unresolved)] },
		);
	}

	return template.replace(PLACEHOLDER, (_match, name: string) => values[name] ?? "");
}

const DOMAIN_PATTERNS: Array<{ domain: TemplateDomain; pattern: RegExp }> = [
	{ domain: "math", pattern: /\d+\s*[-+x×*÷/]\s*\d+/ },
	{
		domain: "math",
		pattern:
			/\b(add(ition)?|subtract(ion)?|multipl(y|ication)|divi(de|sion)|fractions?|plus|minus|sums?|times tables?|counting|numbers?|geometry|shapes?|measur(e|ing|ement))\b/i,
	},
	{
		domain: "science",
		pattern:
			/\b(science|plants?|animals?|habitats?|weather|water cycle|life cycle|magnets?|light|sound|energy|planets?|solar|matter|seasons?|insects?)\b/i,
	},
	{
		domain: "language",
		pattern:
			/\b(reading|spelling|phonics|vowels?|consonants?|nouns?|verbs?|adjectives?|sentences?|rhym(e|es|ing)|punctuation|grammar|letters?|alphabet)\b/i,
	},
];

export function detectTemplateDomain(topic: string): TemplateDomain | null {
	for (const { domain, pattern } of DOMAIN_PATTERNS) {
		if (pattern.test(topic)) return domain;
	}
	return null;
}

export interface PromptTemplateStore {
	readonly default: string;
	get(domain: TemplateDomain): string | undefined;
}

export function createTemplateStore(
	overrides: Partial<Record<TemplateKey, string>> = {},
): PromptTemplateStore {
	const templates: Partial<Record<TemplateDomain, string>> = {
		...SCRIPT_TEMPLATES,
	};
	for (const domain of TEMPLATE_DOMAINS) {
		const override = overrides[domain];
		if (override !== undefined) templates[domain] = override;
	}

	return {
		default: overrides.default ?? DEFAULT_SCRIPT_TEMPLATE,
		get: (domain) => templates[domain],
	};
}

export interface ResolvedTemplate {
	domain: TemplateDomain | "default";
	template: string;
}

export function resolveTemplate(
	store: PromptTemplateStore,
	topic: string,
): ResolvedTemplate {
	const domain = detectTemplateDomain(topic);
	const template = domain ? store.get(domain) : undefined;
	if (domain && template !== undefined) {
		return { domain, template };
	}
	return { domain: "default", template: store.default };
}

function isTemplateKey(value: string): value is TemplateKey {
	return value === "default" || TEMPLATE_DOMAINS.some((domain) => domain === value);
}

/**
 * Reads `<domain>.txt` files (math.txt, default.txt, ...) from a directory.
 * Unknown file names are ignored.
 */
export async function loadTemplateOverrides(
	dir: string,
): Promise<Partial<Record<TemplateKey, string>>> {
	const entries = await readdir(dir);
	const overrides: Partial<Record<TemplateKey, string>> = {};

	for (const entry of entries) {
		if (extname(entry) !== ".txt") continue;
		const key = basename(entry, ".txt");
		if (!isTemplateKey(key)) continue;
		overrides[key] = await readFile(join(dir, entry), "utf-8");
	}

	return overrides;
}
