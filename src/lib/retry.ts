import { RequestAbortedError } from "./errors";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or rejects with RequestAbortedError as soon as `signal` aborts. */
export const sleep: Sleep = (ms, signal) =>
	new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new RequestAbortedError());
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(new RequestAbortedError());
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});

const MAX_BACKOFF_MS = 8000;

/** Exponential backoff: base, 2x base, 4x base, ... capped at 8s. `retry` is 1-based. */
export function backoffDelay(retry: number, baseMs: number): number {
	return Math.min(MAX_BACKOFF_MS, baseMs * 2 ** (retry - 1));
}

export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new RequestAbortedError();
	}
}
