import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { handleZodError } from "../lib/validation";
import {
	CreateScriptSchema,
	RequestNarrationSchema,
	ScriptParamSchema,
	UserIdParamSchema,
} from "../schemas/requests";
import type { ScriptService } from "../services/script-service";

// Mounted under /users, so every path is owner-scoped by :userId
export function createScriptsRoutes(service: ScriptService) {
	return new Hono()
		.post(
			"/:userId/scripts",
			zValidator("param", UserIdParamSchema, handleZodError),
			zValidator("json", CreateScriptSchema, handleZodError),
			async (c) => {
				const { userId } = c.req.valid("param");
				const { topic, narrate, voice } = c.req.valid("json");
				const result = await service.generateForOwner(userId, topic, {
					narrate,
					voice,
					// Client disconnect cancels the in-flight model call
					signal: c.req.raw.signal,
				});
				return c.json(
					{
						id: result.id,
						script: result.document,
						narrationQueued: result.narrationQueued,
					},
					201,
				);
			},
		)
		.get(
			"/:userId/scripts",
			zValidator("param", UserIdParamSchema, handleZodError),
			async (c) => {
				const { userId } = c.req.valid("param");
				const scripts = await service.listScripts(userId);
				return c.json({
					scripts: scripts.map((s) => ({
						id: s.id,
						title: s.title,
						topic: s.topic,
						durationEstimate: s.durationEstimate,
						createdAt: s.createdAt.toISOString(),
					})),
				});
			},
		)
		.get(
			"/:userId/scripts/:scriptId",
			zValidator("param", ScriptParamSchema, handleZodError),
			async (c) => {
				const { userId, scriptId } = c.req.valid("param");
				const stored = await service.getScript(userId, scriptId);
				return c.json({
					id: stored.id,
					title: stored.title,
					topic: stored.topic,
					schemaVersion: stored.schemaVersion,
					script: stored.document,
					createdAt: stored.createdAt.toISOString(),
				});
			},
		)
		.delete(
			"/:userId/scripts/:scriptId",
			zValidator("param", ScriptParamSchema, handleZodError),
			async (c) => {
				const { userId, scriptId } = c.req.valid("param");
				await service.deleteScript(userId, scriptId);
				return c.body(null, 204);
			},
		)
		.post(
			"/:userId/scripts/:scriptId/narration",
			zValidator("param", ScriptParamSchema, handleZodError),
			zValidator("json", RequestNarrationSchema, handleZodError),
			async (c) => {
				const { userId, scriptId } = c.req.valid("param");
				const { voice } = c.req.valid("json");
				const queued = await service.requestNarration(userId, scriptId, voice);
				return c.json({ ...queued, status: "queued" }, 202);
			},
		)
		.get(
			"/:userId/scripts/:scriptId/narration",
			zValidator("param", ScriptParamSchema, handleZodError),
			async (c) => {
				const { userId, scriptId } = c.req.valid("param");
				const segments = await service.getNarration(userId, scriptId);
				return c.json({ scriptId, segments });
			},
		);
}
