import { formatError, NotFoundError } from "../lib/errors";
import { log, type Logger } from "../lib/logger";
import type { NarrationRepository } from "../repositories/narration-repository";
import type { ScriptRepository } from "../repositories/script-repository";
import { NARRATION_SEGMENTS } from "../schemas/script";
import { narrationAudioKey, type AudioStorage } from "./storage-service";
import type { NarrationAdapter } from "./tts-service";

export interface NarrationRequest {
	scriptId: string;
	ownerId: string;
	voice: string;
}

export interface NarrationDeps {
	scripts: ScriptRepository;
	narrations: NarrationRepository;
	adapter: NarrationAdapter;
	storage: AudioStorage;
	logger?: Logger;
}

export interface NarrationSummary {
	scriptId: string;
	completed: number;
	failed: number;
	skipped: number;
}

/**
 * Synthesizes every narrated segment of a stored script once. A failing
 * segment is recorded as failed and the remaining segments still run; the
 * stored script itself is never modified.
 */
export async function narrateScript(
	request: NarrationRequest,
	deps: NarrationDeps,
): Promise<NarrationSummary> {
	const narrationLog = (deps.logger ?? log.narration).child(request.scriptId.slice(0, 8));
	const stored = await deps.scripts.load(request.ownerId, request.scriptId);
	if (!stored) {
		throw new NotFoundError("Script", request.scriptId);
	}

	const summary: NarrationSummary = {
		scriptId: request.scriptId,
		completed: 0,
		failed: 0,
		skipped: 0,
	};

	for (const segment of NARRATION_SEGMENTS) {
		const text = segment.text(stored.document).trim();
		if (!text) {
			summary.skipped++;
			continue;
		}

		const startTime = Date.now();
		try {
			const audio = await deps.adapter.synthesize(text, request.voice);
			const audioKey = await deps.storage.upload(
				narrationAudioKey(request.scriptId, segment.key),
				audio.audioBuffer,
				"audio/mpeg",
			);
			await deps.narrations.record(request.scriptId, {
				segment: segment.key,
				voice: request.voice,
				status: "completed",
				audioKey,
				durationSeconds: audio.durationSeconds,
				captions: audio.captions,
			});
			narrationLog.info("Segment narrated", {
				segment: segment.key,
				durationSeconds: audio.durationSeconds,
				durationMs: Date.now() - startTime,
			});
			summary.completed++;
		} catch (err) {
			const error = formatError(err);
			narrationLog.error("Segment narration failed", {
				segment: segment.key,
				error: error.message,
				durationMs: Date.now() - startTime,
			});
			await deps.narrations
				.record(request.scriptId, {
					segment: segment.key,
					voice: request.voice,
					status: "failed",
					error: error.message,
				})
				.catch((recordErr: unknown) => {
					narrationLog.error("Failed to record segment failure", {
						segment: segment.key,
						error: formatError(recordErr).message,
					});
				});
			summary.failed++;
		}
	}

	narrationLog.info("Narration finished", { ...summary });
	return summary;
}
