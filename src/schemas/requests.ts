import { z } from "zod";

export const CreateUserSchema = z.object({
	username: z.string().min(1).max(50),
});

export const UserIdParamSchema = z.object({
	userId: z.uuid("Invalid user ID format"),
});

export const ScriptParamSchema = UserIdParamSchema.extend({
	scriptId: z.uuid("Invalid script ID format"),
});

const VoiceSchema = z.string().trim().min(1).max(100);

export const CreateScriptSchema = z.object({
	topic: z
		.string()
		.max(500)
		.refine((topic) => topic.trim().length > 0, "Topic is required"),
	narrate: z.boolean().optional(),
	voice: VoiceSchema.optional(),
});

export const RequestNarrationSchema = z.object({
	voice: VoiceSchema.optional(),
});
