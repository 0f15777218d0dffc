export type Job = {
	type: "narrate_script";
	scriptId: string;
	ownerId: string;
	voice: string;
};

export interface JobQueue {
	enqueue(job: Job): void;
	/** True while a narration job for the script is waiting to run. */
	hasNarrationForScript(scriptId: string): boolean;
}
