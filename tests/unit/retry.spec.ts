import { describe, expect, it } from "vitest";
import { RequestAbortedError } from "../../src/lib/errors";
import { backoffDelay, sleep, throwIfAborted } from "../../src/lib/retry";

describe("backoffDelay", () => {
	it("doubles from the base delay", () => {
		expect([1, 2, 3, 4].map((retry) => backoffDelay(retry, 500))).toEqual([500, 1000, 2000, 4000]);
	});

	it("caps at eight seconds", () => {
		expect(backoffDelay(10, 500)).toBe(8000);
	});
});

describe("sleep", () => {
	it("resolves after the delay", async () => {
		await expect(sleep(1)).resolves.toBeUndefined();
	});

	it("rejects immediately for an aborted signal", async () => {
		await expect(sleep(10_000, AbortSignal.abort())).rejects.toBeInstanceOf(RequestAbortedError);
	});

	it("rejects when the signal aborts mid-wait", async () => {
		const controller = new AbortController();
		const pending = sleep(10_000, controller.signal);

		controller.abort();

		await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
	});
});

describe("throwIfAborted", () => {
	it("passes without a signal", () => {
		expect(() => throwIfAborted()).not.toThrow();
	});

	it("throws for an aborted signal", () => {
		expect(() => throwIfAborted(AbortSignal.abort())).toThrow(RequestAbortedError);
	});
});
