import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config";

describe("loadConfig", () => {
	it("applies defaults", () => {
		const config = loadConfig({});

		expect(config.port).toBe(3001);
		expect(config.generator).toEqual({
			model: "openai/gpt-4o-mini",
			maxAttempts: 3,
			maxTransportRetries: 2,
			backoffMs: 500,
			language: "en-US",
			tone: "elementary",
			duration: { wordsPerSecond: 4, sectionPauseSeconds: 1 },
			rejectUnknownSections: true,
		});
		expect(config.narration.enabled).toBe(false);
		expect(config.promptTemplateDir).toBeUndefined();
	});

	it("reads overrides from the environment", () => {
		const config = loadConfig({
			PORT: "8080",
			GENERATION_MAX_ATTEMPTS: "5",
			REJECT_UNKNOWN_SECTIONS: "0",
			NARRATION_ENABLED: "true",
			OPENROUTER_API_KEY: "test-key",
			PROMPT_TEMPLATE_DIR: "./templates",
		});

		expect(config.port).toBe(8080);
		expect(config.generator.maxAttempts).toBe(5);
		expect(config.generator.rejectUnknownSections).toBe(false);
		expect(config.narration.enabled).toBe(true);
		expect(config.openRouter.apiKey).toBe("test-key");
		expect(config.promptTemplateDir).toBe("./templates");
	});

	it("names every invalid variable", () => {
		expect(() => loadConfig({ PORT: "http", GENERATION_MAX_ATTEMPTS: "0" })).toThrow(
			"Missing or invalid environment variables: PORT, GENERATION_MAX_ATTEMPTS",
		);
	});
});
