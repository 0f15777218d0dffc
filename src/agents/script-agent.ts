import { estimateDuration, type DurationHeuristic } from "../lib/duration";
import {
	GenerationFailed,
	ParseError,
	RequestAbortedError,
	TransportError,
	ValidationFailure,
} from "../lib/errors";
import { log, type Logger } from "../lib/logger";
import type { ModelClient } from "../lib/openrouter";
import {
	buildPrompt,
	resolveTemplate,
	type PromptTemplateStore,
} from "../lib/prompt-builder";
import { SCRIPT_SYSTEM_PROMPT } from "../lib/prompts";
import { backoffDelay, sleep as defaultSleep, throwIfAborted, type Sleep } from "../lib/retry";
import { validateScript } from "../lib/script-validator";
import { SCRIPT_SCHEMA_VERSION, type ScriptDocument } from "../schemas/script";

export interface GeneratorConfig {
	model: string;
	/** Full build-call-parse-validate cycles before giving up. */
	maxAttempts: number;
	/** Extra model calls per cycle after a transport failure. */
	maxTransportRetries: number;
	backoffMs: number;
	language: string;
	tone: string;
	duration: DurationHeuristic;
	rejectUnknownSections: boolean;
	schemaVersion?: string;
}

export interface ScriptGeneratorDeps {
	config: GeneratorConfig;
	client: ModelClient;
	templates: PromptTemplateStore;
	sleep?: Sleep;
	logger?: Logger;
}

export interface GenerateOptions {
	signal?: AbortSignal;
}

type AttemptOutcome =
	| { ok: true; document: ScriptDocument }
	| { ok: false; error: ParseError | ValidationFailure };

const WRAPPER_KEY = "edu_script_v0.1";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

/**
 * Turns raw model text into an untyped candidate object. Strips Markdown
 * fences and unwraps `{"edu_script_v0.1": {"content": {...}}}` envelopes.
 * Throws ParseError when the text is not a JSON object.
 */
export function parseModelResponse(text: string): Record<string, unknown> {
	const stripped = text
		.replace(/^```(?:json)?\s*/i, "")
		.replace(/\s*```$/i, "")
		.trim();

	let parsed: unknown;
	try {
		parsed = JSON.parse(stripped);
	} catch (error) {
		throw new ParseError(
			`Model response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
			{ preview: stripped.slice(0, 200) },
		);
	}

	if (!isRecord(parsed)) {
		throw new ParseError("Model response is not a JSON object", {
			received: describeType(parsed),
		});
	}

	const wrapped = parsed[WRAPPER_KEY];
	if (isRecord(wrapped)) {
		return isRecord(wrapped.content) ? wrapped.content : wrapped;
	}
	return parsed;
}

export class ScriptGenerator {
	private readonly config: GeneratorConfig;
	private readonly client: ModelClient;
	private readonly templates: PromptTemplateStore;
	private readonly sleep: Sleep;
	private readonly logger: Logger;

	constructor(deps: ScriptGeneratorDeps) {
		if (deps.config.maxAttempts < 1) {
			throw new RangeError("maxAttempts must be at least 1");
		}
		this.config = deps.config;
		this.client = deps.client;
		this.templates = deps.templates;
		this.sleep = deps.sleep ?? defaultSleep;
		this.logger = deps.logger ?? log.generator;
	}

	/**
	 * Produces a validated script for a topic. Parse and validation failures
	 * are retried up to `maxAttempts` and then surface as GenerationFailed;
	 * ModelError and TemplateError surface on first occurrence.
	 */
	async generate(topic: string, options: GenerateOptions = {}): Promise<ScriptDocument> {
		const { signal } = options;
		const startTime = Date.now();
		const { domain, template } = resolveTemplate(this.templates, topic);

		this.logger.info("Generating script", {
			topic,
			domain,
			model: this.config.model,
		});

		let lastError: ParseError | ValidationFailure | undefined;

		for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
			throwIfAborted(signal);

			const outcome = await this.attempt(topic, template, signal);
			if (outcome.ok) {
				const document = this.finalize(outcome.document);
				this.logger.info("Script generated", {
					topic,
					attempt,
					durationEstimate: document.metadata.duration_estimate,
					durationMs: Date.now() - startTime,
				});
				return document;
			}

			lastError = outcome.error;
			this.logger.warn("Generation attempt rejected", {
				topic,
				attempt,
				maxAttempts: this.config.maxAttempts,
				reason: outcome.error.code,
				...(outcome.error instanceof ValidationFailure && {
					violations: outcome.error.violations.map((v) => `${v.path}: ${v.rule}`),
				}),
			});
		}

		// maxAttempts >= 1 guarantees at least one recorded failure here
		const failure = new GenerationFailed(
			this.config.maxAttempts,
			lastError ?? new ParseError("No generation attempt was made"),
		);
		this.logger.error("Script generation failed", {
			topic,
			attempts: this.config.maxAttempts,
			durationMs: Date.now() - startTime,
		});
		throw failure;
	}

	private async attempt(
		topic: string,
		template: string,
		signal?: AbortSignal,
	): Promise<AttemptOutcome> {
		const prompt = buildPrompt(topic, template, {
			language: this.config.language,
			tone: this.config.tone,
		});

		let candidate: Record<string, unknown>;
		try {
			const raw = await this.callModel(prompt, signal);
			this.logger.debug("LLM response received", { topic, responseLength: raw.length });
			candidate = parseModelResponse(raw);
		} catch (error) {
			if (error instanceof ParseError) {
				return { ok: false, error };
			}
			throw error;
		}

		const result = validateScript(this.stampMetadata(candidate, topic), {
			version: this.config.schemaVersion ?? SCRIPT_SCHEMA_VERSION,
			rejectUnknownSections: this.config.rejectUnknownSections,
		});

		return result.valid
			? { ok: true, document: result.document }
			: { ok: false, error: new ValidationFailure(result.violations) };
	}

	private async callModel(prompt: string, signal?: AbortSignal): Promise<string> {
		for (let retry = 0; ; retry++) {
			try {
				return await this.client.complete({
					model: this.config.model,
					system: SCRIPT_SYSTEM_PROMPT,
					prompt,
					signal,
				});
			} catch (error) {
				if (!(error instanceof TransportError)) throw error;
				if (signal?.aborted) throw new RequestAbortedError();
				if (retry >= this.config.maxTransportRetries) throw error;

				const delayMs = backoffDelay(retry + 1, this.config.backoffMs);
				this.logger.warn("Model call failed, retrying", {
					retry: retry + 1,
					maxRetries: this.config.maxTransportRetries,
					delayMs,
					error: error.message,
				});
				await this.sleep(delayMs, signal);
			}
		}
	}

	/** Metadata is authoritative on our side; whatever the model sent is replaced. */
	private stampMetadata(
		candidate: Record<string, unknown>,
		topic: string,
	): Record<string, unknown> {
		return {
			...candidate,
			metadata: {
				version: this.config.schemaVersion ?? SCRIPT_SCHEMA_VERSION,
				language: this.config.language,
				tone: this.config.tone,
				topic,
				duration_estimate: 0,
			},
		};
	}

	private finalize(document: ScriptDocument): ScriptDocument {
		return {
			...document,
			metadata: {
				...document.metadata,
				duration_estimate: estimateDuration(document, this.config.duration),
			},
		};
	}
}
