import { log } from "../lib/logger";
import type { Job, JobQueue } from "./types";

const jobs: Job[] = [];

export function enqueue(job: Job): void {
  jobs.push(job);
  log.queue.info("Job enqueued", {
    type: job.type,
    script: job.scriptId,
    queueLength: jobs.length,
  });
}

export function dequeue(): Job | undefined {
  const job = jobs.shift();
  if (job) {
    log.queue.debug("Job dequeued", {
      type: job.type,
      remaining: jobs.length,
    });
  }
  return job;
}

/** Check if a narration job for this script is already queued */
export function hasNarrationForScript(scriptId: string): boolean {
  return jobs.some((j) => j.type === "narrate_script" && j.scriptId === scriptId);
}

export const memoryQueue: JobQueue = { enqueue, hasNarrationForScript };
