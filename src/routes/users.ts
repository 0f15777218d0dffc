import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { handleZodError } from "../lib/validation";
import type { UserRepository } from "../repositories/user-repository";
import { CreateUserSchema, UserIdParamSchema } from "../schemas/requests";

export function createUsersRoutes(users: UserRepository) {
	return new Hono()
		.post(
			"/",
			zValidator("json", CreateUserSchema, handleZodError),
			async (c) => {
				const { username } = c.req.valid("json");
				const user = await users.createUser(username);
				return c.json(user, 201);
			},
		)
		.get(
			"/:userId",
			zValidator("param", UserIdParamSchema, handleZodError),
			async (c) => {
				const { userId } = c.req.valid("param");
				const user = await users.getUserById(userId);
				if (!user)
					return c.json(
						{ error: { code: "NOT_FOUND", message: "User not found" } },
						404,
					);
				return c.json(user);
			},
		);
}
