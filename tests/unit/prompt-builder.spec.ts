import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TemplateError, ValidationError } from "../../src/lib/errors";
import {
	buildPrompt,
	createTemplateStore,
	detectTemplateDomain,
	loadTemplateOverrides,
	resolveTemplate,
} from "../../src/lib/prompt-builder";
import { DEFAULT_SCRIPT_TEMPLATE, SCRIPT_TEMPLATES } from "../../src/lib/prompts";

describe("buildPrompt", () => {
	it("substitutes topic, language and tone", () => {
		const prompt = buildPrompt("  Counting to 20 ", "Teach {{topic}} in {{language}} ({{ tone }}).", {
			language: "en-US",
			tone: "playful",
		});

		expect(prompt).toBe("Teach Counting to 20 in en-US (playful).");
	});

	it("substitutes every occurrence of the topic", () => {
		expect(buildPrompt("Fractions", "{{topic}} / {{topic}}")).toBe("Fractions / Fractions");
	});

	it("is deterministic", () => {
		const vars = { language: "en-US", tone: "elementary" };
		const first = buildPrompt("Magnets", DEFAULT_SCRIPT_TEMPLATE, vars);

		expect(buildPrompt("Magnets", DEFAULT_SCRIPT_TEMPLATE, vars)).toBe(first);
	});

	it("rejects an empty topic", () => {
		expect(() => buildPrompt("   ", "{{topic}}")).toThrow(ValidationError);
	});

	it("rejects a template without the topic placeholder", () => {
		const build = () => buildPrompt("Magnets", "Write a script.");

		expect(build).toThrow(TemplateError);
		expect(build).toThrow("Template is missing the {{topic}} placeholder");
	});

	it("names unresolved placeholders", () => {
		expect(() => buildPrompt("Magnets", "{{topic}} {{grade}} {{grade}}")).toThrow(
			"Template has unresolved placeholders: grade",
		);
	});

	it("treats language as unresolved when no value is given", () => {
		expect(() => buildPrompt("Magnets", "{{topic}} in {{language}}")).toThrow(
			"Template has unresolved placeholders: language",
		);
	});
});

describe("detectTemplateDomain", () => {
	it.each([
		["Subtraction within 10: 9 - 4", "math"],
		["3 + 5", "math"],
		["Adding fractions", "math"],
		["How plants drink water", "science"],
		["The water cycle", "science"],
		["Short vowels", "language"],
		["Rhyming words", "language"],
	])("maps %s to %s", (topic, domain) => {
		expect(detectTemplateDomain(topic)).toBe(domain);
	});

	it("returns null for an unrecognized topic", () => {
		expect(detectTemplateDomain("Being kind to friends")).toBeNull();
	});
});

describe("resolveTemplate", () => {
	it("picks the domain template", () => {
		const store = createTemplateStore();

		expect(resolveTemplate(store, "Subtraction within 10: 9 - 4")).toEqual({
			domain: "math",
			template: SCRIPT_TEMPLATES.math,
		});
	});

	it("falls back to the default template", () => {
		expect(resolveTemplate(createTemplateStore(), "Being kind to friends")).toEqual({
			domain: "default",
			template: DEFAULT_SCRIPT_TEMPLATE,
		});
	});

	it("prefers overrides", () => {
		const store = createTemplateStore({ science: "Science: {{topic}}", default: "Any: {{topic}}" });

		expect(resolveTemplate(store, "Magnets").template).toBe("Science: {{topic}}");
		expect(resolveTemplate(store, "Being kind").template).toBe("Any: {{topic}}");
		expect(resolveTemplate(store, "2 + 2").template).toBe(SCRIPT_TEMPLATES.math);
	});
});

describe("loadTemplateOverrides", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "templates-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("reads known template files and ignores the rest", async () => {
		await writeFile(join(dir, "math.txt"), "Math: {{topic}}");
		await writeFile(join(dir, "default.txt"), "Any: {{topic}}");
		await writeFile(join(dir, "history.txt"), "History: {{topic}}");
		await writeFile(join(dir, "science.md"), "Science: {{topic}}");

		expect(await loadTemplateOverrides(dir)).toEqual({
			math: "Math: {{topic}}",
			default: "Any: {{topic}}",
		});
	});
});
