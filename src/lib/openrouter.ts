import OpenAI, {
	APIConnectionError,
	APIError,
	APIUserAbortError,
	type ClientOptions,
} from "openai";
import {
	ModelError,
	ParseError,
	RequestAbortedError,
	TransportError,
} from "./errors";

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

const SERVICE = "OpenRouter";

export interface ModelRequest {
	model: string;
	system: string;
	prompt: string;
	signal?: AbortSignal;
}

/** Sends one prompt in JSON mode and returns the raw text of the reply. */
export interface ModelClient {
	complete(request: ModelRequest): Promise<string>;
}

export interface OpenRouterClientOptions {
	apiKey: string;
	baseURL?: string;
	timeoutMs: number;
	temperature?: number;
	maxTokens?: number;
	/** Replaces the global fetch, e.g. to route through a proxy agent. */
	fetch?: ClientOptions["fetch"];
}

/**
 * Maps SDK failures onto the pipeline's error kinds: connection problems,
 * timeouts and 5xx are transport errors (retriable), any other HTTP status is
 * the vendor rejecting the request.
 */
export function mapModelError(error: unknown): Error {
	if (error instanceof APIUserAbortError) {
		return new RequestAbortedError();
	}
	if (error instanceof APIConnectionError) {
		return new TransportError(SERVICE, error.message, { cause: error });
	}
	if (error instanceof APIError) {
		if (error.status === undefined || error.status >= 500) {
			return new TransportError(SERVICE, error.message, {
				cause: error,
				status: error.status,
			});
		}
		return new ModelError(`${SERVICE} rejected the request: ${error.message}`, error.status, error);
	}
	if (error instanceof Error) {
		return error;
	}
	return new Error(String(error));
}

export class OpenRouterModelClient implements ModelClient {
	private readonly client: OpenAI;

	constructor(private readonly options: OpenRouterClientOptions) {
		if (!options.apiKey) {
			throw new Error(
				"Missing OpenRouter API key. Set OPENROUTER_API_KEY in .env",
			);
		}
		this.client = new OpenAI({
			apiKey: options.apiKey,
			baseURL: options.baseURL ?? OPENROUTER_BASE_URL,
			timeout: options.timeoutMs,
			// Retries are owned by the script generator
			maxRetries: 0,
			fetch: options.fetch,
		});
	}

	async complete({ model, system, prompt, signal }: ModelRequest): Promise<string> {
		const completion = await this.client.chat.completions
			.create(
				{
					model,
					messages: [
						{ role: "system", content: system },
						{ role: "user", content: prompt },
					],
					response_format: { type: "json_object" },
					temperature: this.options.temperature ?? 0.7,
					max_tokens: this.options.maxTokens ?? 2000,
				},
				{ signal },
			)
			.catch((error: unknown) => {
				throw mapModelError(error);
			});

		const content = completion.choices[0]?.message.content;
		if (!content) {
			throw new ParseError("Model returned an empty completion", {
				finishReason: completion.choices[0]?.finish_reason,
			});
		}
		return content;
	}
}
