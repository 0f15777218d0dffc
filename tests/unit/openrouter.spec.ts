import {
	APIConnectionError,
	APIError,
	APIUserAbortError,
	type ClientOptions,
} from "openai";
import { describe, expect, it } from "vitest";
import { ModelError, ParseError, RequestAbortedError, TransportError } from "../../src/lib/errors";
import { mapModelError, OpenRouterModelClient } from "../../src/lib/openrouter";

describe("mapModelError", () => {
	it("treats quota rejections as model errors", () => {
		const mapped = mapModelError(new APIError(429, undefined, "quota", undefined));

		expect(mapped).toBeInstanceOf(ModelError);
		expect(mapped instanceof ModelError && mapped.status).toBe(429);
	});

	it("treats auth failures as model errors", () => {
		expect(mapModelError(new APIError(401, undefined, "bad key", undefined))).toBeInstanceOf(
			ModelError,
		);
	});

	it("treats server errors as transport errors", () => {
		const mapped = mapModelError(new APIError(503, undefined, "unavailable", undefined));

		expect(mapped).toBeInstanceOf(TransportError);
		expect(mapped instanceof TransportError && mapped.details).toEqual({
			service: "OpenRouter",
			status: 503,
		});
	});

	it("treats connection failures as transport errors", () => {
		expect(mapModelError(new APIConnectionError({ message: "ECONNRESET" }))).toBeInstanceOf(
			TransportError,
		);
	});

	it("maps caller aborts", () => {
		expect(mapModelError(new APIUserAbortError())).toBeInstanceOf(RequestAbortedError);
	});

	it("passes other errors through", () => {
		const error = new RangeError("boom");

		expect(mapModelError(error)).toBe(error);
		expect(mapModelError("text").message).toBe("text");
	});
});

type Fetch = NonNullable<ClientOptions["fetch"]>;

const BASE_URL = "https://openrouter.test/api/v1";

function jsonResponse(status: number, body: unknown): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "content-type": "application/json" },
	});
}

function completion(content: string | null): Response {
	return jsonResponse(200, {
		id: "chatcmpl-test",
		object: "chat.completion",
		created: 0,
		model: "test-model",
		choices: [
			{
				index: 0,
				message: { role: "assistant", content, refusal: null },
				finish_reason: "stop",
				logprobs: null,
			},
		],
	});
}

function recordingFetch(reply: () => Response) {
	const calls: Array<{ url: string; body: unknown }> = [];
	const fetch: Fetch = async (input, init) => {
		calls.push({
			url: String(input),
			body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
		});
		return reply();
	};
	return { fetch, calls };
}

function clientWith(fetch: Fetch) {
	return new OpenRouterModelClient({
		apiKey: "test-key",
		baseURL: BASE_URL,
		timeoutMs: 5000,
		fetch,
	});
}

const request = { model: "test-model", system: "Be brief.", prompt: "Write it." };

describe("OpenRouterModelClient", () => {
	it("requires an API key", () => {
		expect(() => new OpenRouterModelClient({ apiKey: "", timeoutMs: 1000 })).toThrow(
			"Missing OpenRouter API key",
		);
	});

	it("asks for a JSON object and returns the reply text", async () => {
		const { fetch, calls } = recordingFetch(() => completion('{"intro":{}}'));

		const text = await clientWith(fetch).complete(request);

		expect(text).toBe('{"intro":{}}');
		expect(calls).toHaveLength(1);
		expect(calls[0]?.url).toBe(`${BASE_URL}/chat/completions`);
		expect(calls[0]?.body).toMatchObject({
			model: "test-model",
			messages: [
				{ role: "system", content: "Be brief." },
				{ role: "user", content: "Write it." },
			],
			response_format: { type: "json_object" },
			temperature: 0.7,
			max_tokens: 2000,
		});
	});

	it("treats an empty completion as a parse failure", async () => {
		const { fetch } = recordingFetch(() => completion(""));

		const pending = clientWith(fetch).complete(request);

		await expect(pending).rejects.toBeInstanceOf(ParseError);
		await expect(pending).rejects.toThrow("Model returned an empty completion");
	});

	it("does not send a request for an aborted signal", async () => {
		const { fetch, calls } = recordingFetch(() => completion("{}"));

		await expect(
			clientWith(fetch).complete({ ...request, signal: AbortSignal.abort() }),
		).rejects.toBeInstanceOf(RequestAbortedError);
		expect(calls).toHaveLength(0);
	});

	it("cancels the in-flight request when the signal aborts", async () => {
		const controller = new AbortController();
		const fetch: Fetch = (_input, init) =>
			new Promise((_resolve, reject) => {
				init?.signal?.addEventListener("abort", () => {
					reject(new DOMException("The operation was aborted.", "AbortError"));
				});
				controller.abort();
			});

		await expect(
			clientWith(fetch).complete({ ...request, signal: controller.signal }),
		).rejects.toBeInstanceOf(RequestAbortedError);
	});

	it("maps a 503 to a transport error", async () => {
		const { fetch, calls } = recordingFetch(() =>
			jsonResponse(503, { error: { message: "upstream busy" } }),
		);

		await expect(clientWith(fetch).complete(request)).rejects.toBeInstanceOf(TransportError);
		expect(calls).toHaveLength(1);
	});

	it("maps a 429 to a model error", async () => {
		const { fetch } = recordingFetch(() => jsonResponse(429, { error: { message: "quota" } }));

		await expect(clientWith(fetch).complete(request)).rejects.toBeInstanceOf(ModelError);
	});
});
