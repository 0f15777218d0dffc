import { z } from "zod";
import type { GeneratorConfig } from "./agents/script-agent";
import type { LogLevel } from "./lib/logger";
import { OPENROUTER_BASE_URL } from "./lib/openrouter";

const booleanFlag = (fallback: boolean) =>
	z
		.enum(["true", "false", "1", "0"])
		.default(fallback ? "true" : "false")
		.transform((v) => v === "true" || v === "1");

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
	PORT: z.coerce.number().int().min(1).max(65535).default(3001),
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

	DATABASE_URL: z.string().min(1).default("postgres://localhost:5432/lesson_scripts"),

	// Script generation
	OPENROUTER_API_KEY: z.string().default(""),
	OPENROUTER_BASE_URL: z.url().default(OPENROUTER_BASE_URL),
	SCRIPT_MODEL: z.string().min(1).default("openai/gpt-4o-mini"),
	MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
	GENERATION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(3),
	TRANSPORT_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
	TRANSPORT_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
	SCRIPT_LANGUAGE: z.string().min(1).default("en-US"),
	SCRIPT_TONE: z.string().min(1).default("elementary"),
	NARRATION_WORDS_PER_SECOND: z.coerce.number().positive().default(4),
	NARRATION_SECTION_PAUSE_SECONDS: z.coerce.number().min(0).default(1),
	REJECT_UNKNOWN_SECTIONS: booleanFlag(true),
	PROMPT_TEMPLATE_DIR: z.string().min(1).optional(),

	// Narration
	NARRATION_ENABLED: booleanFlag(false),
	ELEVENLABS_API_KEY: z.string().default(""),
	ELEVENLABS_VOICE_ID: z.string().min(1).default("21m00Tcm4TlvDq8ikWAM"),
	ELEVENLABS_MODEL_ID: z.string().min(1).default("eleven_multilingual_v2"),
	NARRATION_TIMEOUT_SECONDS: z.coerce.number().positive().default(60),

	// Audio storage
	AWS_REGION: z.string().min(1).default("us-east-2"),
	ASSETS_BUCKET: z.string().min(1).default("lesson-script-assets"),

	WORKER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
});

export interface AppConfig {
	port: number;
	env: "development" | "production" | "test";
	logLevel: LogLevel;
	databaseUrl: string;
	openRouter: {
		apiKey: string;
		baseURL: string;
		timeoutMs: number;
	};
	generator: GeneratorConfig;
	promptTemplateDir?: string;
	narration: {
		enabled: boolean;
		apiKey: string;
		defaultVoice: string;
		modelId: string;
		timeoutSeconds: number;
	};
	storage: {
		region: string;
		bucket: string;
	};
	workerPollIntervalMs: number;
}

/**
 * Parses an environment map into the application config. Throws with the
 * names of every missing or invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		const invalid = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
		throw new Error(`Missing or invalid environment variables: ${invalid}`);
	}
	const e = parsed.data;

	return {
		port: e.PORT,
		env: e.NODE_ENV,
		logLevel: e.LOG_LEVEL,
		databaseUrl: e.DATABASE_URL,
		openRouter: {
			apiKey: e.OPENROUTER_API_KEY,
			baseURL: e.OPENROUTER_BASE_URL,
			timeoutMs: e.MODEL_TIMEOUT_MS,
		},
		generator: {
			model: e.SCRIPT_MODEL,
			maxAttempts: e.GENERATION_MAX_ATTEMPTS,
			maxTransportRetries: e.TRANSPORT_MAX_RETRIES,
			backoffMs: e.TRANSPORT_BACKOFF_MS,
			language: e.SCRIPT_LANGUAGE,
			tone: e.SCRIPT_TONE,
			duration: {
				wordsPerSecond: e.NARRATION_WORDS_PER_SECOND,
				sectionPauseSeconds: e.NARRATION_SECTION_PAUSE_SECONDS,
			},
			rejectUnknownSections: e.REJECT_UNKNOWN_SECTIONS,
		},
		promptTemplateDir: e.PROMPT_TEMPLATE_DIR,
		narration: {
			enabled: e.NARRATION_ENABLED,
			apiKey: e.ELEVENLABS_API_KEY,
			defaultVoice: e.ELEVENLABS_VOICE_ID,
			modelId: e.ELEVENLABS_MODEL_ID,
			timeoutSeconds: e.NARRATION_TIMEOUT_SECONDS,
		},
		storage: {
			region: e.AWS_REGION,
			bucket: e.ASSETS_BUCKET,
		},
		workerPollIntervalMs: e.WORKER_POLL_INTERVAL_MS,
	};
}
