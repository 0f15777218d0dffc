import { describe, expect, it } from "vitest";
import { ConflictError, GenerationFailed, NotFoundError } from "../../src/lib/errors";
import { createTestServices, DEFAULT_VOICE } from "../support/services";
import { modelReply, SUBTRACTION_TOPIC } from "../support/fixtures";

describe("script service", () => {
	it("stores a generated script for its owner", async () => {
		const { service, users, scripts } = createTestServices();
		const user = await users.createUser("teacher");

		const result = await service.generateForOwner(user.id, SUBTRACTION_TOPIC);

		expect(result.narrationQueued).toBe(false);
		const stored = await scripts.load(user.id, result.id);
		expect(stored?.document).toEqual(result.document);
		expect(stored?.title).toBe(SUBTRACTION_TOPIC);
	});

	it("rejects an unknown owner before calling the model", async () => {
		const { service, client } = createTestServices();

		await expect(service.generateForOwner("missing", SUBTRACTION_TOPIC)).rejects.toBeInstanceOf(
			NotFoundError,
		);
		expect(client.requests).toHaveLength(0);
	});

	it("stores nothing when generation fails", async () => {
		const { service, users, scripts } = createTestServices({ replies: ["nope"] });
		const user = await users.createUser("teacher");

		await expect(service.generateForOwner(user.id, SUBTRACTION_TOPIC)).rejects.toBeInstanceOf(
			GenerationFailed,
		);
		expect(scripts.rows.size).toBe(0);
	});

	it("queues narration with the default voice", async () => {
		const { service, users, queue } = createTestServices();
		const user = await users.createUser("teacher");

		const result = await service.generateForOwner(user.id, SUBTRACTION_TOPIC, { narrate: true });

		expect(result.narrationQueued).toBe(true);
		expect(queue.jobs).toEqual([
			{ type: "narrate_script", scriptId: result.id, ownerId: user.id, voice: DEFAULT_VOICE },
		]);
	});

	it("does not queue narration while it is disabled", async () => {
		const { service, users, queue } = createTestServices({ narrationEnabled: false });
		const user = await users.createUser("teacher");

		const result = await service.generateForOwner(user.id, SUBTRACTION_TOPIC, { narrate: true });

		expect(result.narrationQueued).toBe(false);
		expect(queue.jobs).toEqual([]);
	});

	it("hides scripts from other owners", async () => {
		const { service, users } = createTestServices();
		const owner = await users.createUser("owner");
		const other = await users.createUser("other");
		const { id } = await service.generateForOwner(owner.id, SUBTRACTION_TOPIC);

		await expect(service.getScript(other.id, id)).rejects.toBeInstanceOf(NotFoundError);
		await expect(service.deleteScript(other.id, id)).rejects.toBeInstanceOf(NotFoundError);
		expect(await service.listScripts(other.id)).toEqual([]);
	});

	it("lists the newest script first", async () => {
		const { service, users } = createTestServices({
			replies: [modelReply(), modelReply()],
		});
		const user = await users.createUser("teacher");
		const first = await service.generateForOwner(user.id, "Subtraction within 10: 9 - 4");
		const second = await service.generateForOwner(user.id, "Subtraction within 10: 8 - 3");

		const list = await service.listScripts(user.id);

		expect(list.map((s) => s.id)).toEqual([second.id, first.id]);
		expect(list[0]?.durationEstimate).toBe(12.5);
	});

	it("deletes a script once", async () => {
		const { service, users } = createTestServices();
		const user = await users.createUser("teacher");
		const { id } = await service.generateForOwner(user.id, SUBTRACTION_TOPIC);

		await service.deleteScript(user.id, id);

		await expect(service.deleteScript(user.id, id)).rejects.toBeInstanceOf(NotFoundError);
	});

	it("queues a narration request once", async () => {
		const { service, users, queue } = createTestServices();
		const user = await users.createUser("teacher");
		const { id } = await service.generateForOwner(user.id, SUBTRACTION_TOPIC);

		expect(await service.requestNarration(user.id, id, "custom-voice")).toEqual({
			scriptId: id,
			voice: "custom-voice",
		});
		await expect(service.requestNarration(user.id, id)).rejects.toBeInstanceOf(ConflictError);
		expect(queue.jobs).toHaveLength(1);
	});

	it("refuses narration requests while disabled", async () => {
		const { service, users } = createTestServices({ narrationEnabled: false });
		const user = await users.createUser("teacher");
		const { id } = await service.generateForOwner(user.id, SUBTRACTION_TOPIC);

		await expect(service.requestNarration(user.id, id)).rejects.toThrow("Narration is disabled");
	});

	it("attaches playable URLs to narrated segments", async () => {
		const { service, users, narrations } = createTestServices();
		const user = await users.createUser("teacher");
		const { id } = await service.generateForOwner(user.id, SUBTRACTION_TOPIC);
		await narrations.record(id, {
			segment: "intro_narration",
			voice: DEFAULT_VOICE,
			status: "completed",
			audioKey: `narrations/${id}/intro_narration.mp3`,
		});
		await narrations.record(id, {
			segment: "summary_narration",
			voice: DEFAULT_VOICE,
			status: "failed",
			error: "boom",
		});

		expect(await service.getNarration(user.id, id)).toEqual([
			{
				segment: "intro_narration",
				voice: DEFAULT_VOICE,
				status: "completed",
				audioKey: `narrations/${id}/intro_narration.mp3`,
				audioUrl: `https://storage.test/narrations/${id}/intro_narration.mp3`,
			},
			{ segment: "summary_narration", voice: DEFAULT_VOICE, status: "failed", error: "boom" },
		]);
	});
});
