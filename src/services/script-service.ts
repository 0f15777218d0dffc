import type { ScriptGenerator } from "../agents/script-agent";
import { ConflictError, NotFoundError } from "../lib/errors";
import { log } from "../lib/logger";
import type { JobQueue } from "../queue/types";
import type { NarrationRepository } from "../repositories/narration-repository";
import type {
	ScriptRepository,
	ScriptSummary,
	StoredScript,
} from "../repositories/script-repository";
import type { UserRepository } from "../repositories/user-repository";
import type { ScriptDocument } from "../schemas/script";
import type { NarrationSegmentResult } from "../types/narration";
import type { AudioStorage } from "./storage-service";

export interface ScriptServiceDeps {
	users: Pick<UserRepository, "getUserById">;
	scripts: ScriptRepository;
	narrations: NarrationRepository;
	generator: Pick<ScriptGenerator, "generate">;
	queue: JobQueue;
	storage: Pick<AudioStorage, "getUrl">;
	narration: {
		enabled: boolean;
		defaultVoice: string;
	};
}

export interface GenerateScriptOptions {
	narrate?: boolean;
	voice?: string;
	signal?: AbortSignal;
}

export interface GenerateScriptResult {
	id: string;
	document: ScriptDocument;
	narrationQueued: boolean;
}

export interface NarrationSegmentView extends NarrationSegmentResult {
	audioUrl?: string;
}

export type ScriptService = ReturnType<typeof createScriptService>;

export function createScriptService(deps: ScriptServiceDeps) {
	async function requireUser(ownerId: string): Promise<void> {
		const user = await deps.users.getUserById(ownerId);
		if (!user) throw new NotFoundError("User", ownerId);
	}

	async function requireScript(ownerId: string, scriptId: string): Promise<StoredScript> {
		const stored = await deps.scripts.load(ownerId, scriptId);
		if (!stored) throw new NotFoundError("Script", scriptId);
		return stored;
	}

	function queueNarration(ownerId: string, scriptId: string, voice?: string): string {
		const selectedVoice = voice ?? deps.narration.defaultVoice;
		deps.queue.enqueue({
			type: "narrate_script",
			scriptId,
			ownerId,
			voice: selectedVoice,
		});
		return selectedVoice;
	}

	return {
		/**
		 * Generates, validates and stores a script for the owner. Nothing is
		 * persisted unless generation succeeds; narration runs afterwards in
		 * the background when requested and enabled.
		 */
		async generateForOwner(
			ownerId: string,
			topic: string,
			options: GenerateScriptOptions = {},
		): Promise<GenerateScriptResult> {
			await requireUser(ownerId);

			const document = await deps.generator.generate(topic, {
				signal: options.signal,
			});
			const id = await deps.scripts.save(ownerId, document);

			log.api.info("Script stored", { id, owner: ownerId, topic });

			const narrationQueued = Boolean(options.narrate) && deps.narration.enabled;
			if (narrationQueued) {
				queueNarration(ownerId, id, options.voice);
			} else if (options.narrate) {
				log.api.warn("Narration requested but disabled", { id });
			}

			return { id, document, narrationQueued };
		},

		async getScript(ownerId: string, scriptId: string): Promise<StoredScript> {
			return requireScript(ownerId, scriptId);
		},

		async listScripts(ownerId: string): Promise<ScriptSummary[]> {
			await requireUser(ownerId);
			return deps.scripts.list(ownerId);
		},

		async deleteScript(ownerId: string, scriptId: string): Promise<void> {
			const deleted = await deps.scripts.delete(ownerId, scriptId);
			if (!deleted) throw new NotFoundError("Script", scriptId);
			log.api.info("Script deleted", { id: scriptId, owner: ownerId });
		},

		async requestNarration(
			ownerId: string,
			scriptId: string,
			voice?: string,
		): Promise<{ scriptId: string; voice: string }> {
			if (!deps.narration.enabled) {
				throw new ConflictError("Narration is disabled", { scriptId });
			}
			await requireScript(ownerId, scriptId);
			if (deps.queue.hasNarrationForScript(scriptId)) {
				throw new ConflictError("Narration already queued for script", { scriptId });
			}
			return { scriptId, voice: queueNarration(ownerId, scriptId, voice) };
		},

		async getNarration(ownerId: string, scriptId: string): Promise<NarrationSegmentView[]> {
			await requireScript(ownerId, scriptId);
			const segments = await deps.narrations.listByScript(scriptId);

			return Promise.all(
				segments.map(async (segment) =>
					segment.audioKey
						? { ...segment, audioUrl: await deps.storage.getUrl(segment.audioKey) }
						: segment,
				),
			);
		},
	};
}
