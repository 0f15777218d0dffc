export { enqueue, dequeue, hasNarrationForScript, memoryQueue } from "./queue";
export { startWorker, processJob, type WorkerDeps } from "./worker";
export type { Job, JobQueue } from "./types";
