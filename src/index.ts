import "dotenv/config";
import { serve } from "@hono/node-server";
import { ScriptGenerator } from "./agents/script-agent";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { formatError } from "./lib/errors";
import { log, setLogLevel } from "./lib/logger";
import { OpenRouterModelClient } from "./lib/openrouter";
import { createTemplateStore, loadTemplateOverrides } from "./lib/prompt-builder";
import { memoryQueue, startWorker } from "./queue";
import { DrizzleNarrationRepository } from "./repositories/narration-repository";
import { DrizzleScriptRepository } from "./repositories/script-repository";
import { DrizzleUserRepository } from "./repositories/user-repository";
import { createScriptService } from "./services/script-service";
import { S3AudioStorage } from "./services/storage-service";
import { ElevenLabsNarrationAdapter } from "./services/tts-service";

async function main(): Promise<void> {
	const config = loadConfig(process.env);
	setLogLevel(config.logLevel);

	const database = createDatabase(config.databaseUrl);
	const users = new DrizzleUserRepository(database.db);
	const scripts = new DrizzleScriptRepository(database.db);
	const narrations = new DrizzleNarrationRepository(database.db);
	const storage = new S3AudioStorage(config.storage);

	const templates = createTemplateStore(
		config.promptTemplateDir ? await loadTemplateOverrides(config.promptTemplateDir) : {},
	);
	const generator = new ScriptGenerator({
		config: config.generator,
		client: new OpenRouterModelClient(config.openRouter),
		templates,
	});

	const scriptService = createScriptService({
		users,
		scripts,
		narrations,
		generator,
		queue: memoryQueue,
		storage,
		narration: config.narration,
	});

	const stopWorker = config.narration.enabled
		? startWorker({
				narration: {
					scripts,
					narrations,
					storage,
					adapter: new ElevenLabsNarrationAdapter(config.narration),
				},
				pollIntervalMs: config.workerPollIntervalMs,
			})
		: undefined;

	const app = createApp({
		users,
		scripts: scriptService,
		production: config.env === "production",
	});

	const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
		log.api.info("Server started", {
			port: info.port,
			model: config.generator.model,
			narration: config.narration.enabled,
		});
	});

	const shutdown = (signal: string) => {
		log.api.info("Shutting down", { signal });
		stopWorker?.();
		server.close(() => {
			database
				.close()
				.catch((err: unknown) => {
					log.db.error("Failed to close pool", { error: formatError(err).message });
				})
				.finally(() => process.exit(0));
		});
	};

	process.on("SIGINT", () => shutdown("SIGINT"));
	process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
	log.api.error("Failed to start", { error: formatError(err).message });
	process.exit(1);
});
