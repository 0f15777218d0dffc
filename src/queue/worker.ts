import { formatError, JobError } from "../lib/errors";
import { log } from "../lib/logger";
import { narrateScript, type NarrationDeps } from "../services/narration-service";
import { dequeue } from "./queue";
import type { Job } from "./types";

export interface WorkerDeps {
	narration: NarrationDeps;
	pollIntervalMs: number;
	/** Defaults to the in-memory queue */
	next?: () => Job | undefined;
}

async function processNarrationJob(
	job: Extract<Job, { type: "narrate_script" }>,
	deps: WorkerDeps,
): Promise<void> {
	const jobLog = log.worker.child("narration");
	const startTime = Date.now();

	jobLog.info("Starting narration", { script: job.scriptId, voice: job.voice });

	try {
		const summary = await narrateScript(
			{ scriptId: job.scriptId, ownerId: job.ownerId, voice: job.voice },
			deps.narration,
		);
		jobLog.info("Narration job completed", {
			script: job.scriptId,
			completed: summary.completed,
			failed: summary.failed,
			totalDurationMs: Date.now() - startTime,
		});
	} catch (err) {
		const error = formatError(err);
		jobLog.error("Narration job failed", {
			script: job.scriptId,
			error: error.message,
			durationMs: Date.now() - startTime,
		});
		throw new JobError("narrate_script", job.scriptId, `Failed to narrate script: ${error.message}`, err);
	}
}

export async function processJob(job: Job, deps: WorkerDeps): Promise<void> {
	if (job.type === "narrate_script") {
		await processNarrationJob(job, deps);
	}
}

/** Polls the queue and runs one job at a time. Returns a function that stops polling. */
export function startWorker(deps: WorkerDeps): () => void {
	const next = deps.next ?? dequeue;
	let busy = false;

	log.worker.info("Worker started", { pollIntervalMs: deps.pollIntervalMs });

	const timer = setInterval(() => {
		if (busy) return;
		const job = next();
		if (!job) return;

		busy = true;
		processJob(job, deps)
			.catch((err: unknown) => {
				log.worker.warn("Job dropped after failure", {
					type: job.type,
					error: formatError(err).message,
				});
			})
			.finally(() => {
				busy = false;
			});
	}, deps.pollIntervalMs);

	return () => {
		clearInterval(timer);
		log.worker.info("Worker stopped");
	};
}
