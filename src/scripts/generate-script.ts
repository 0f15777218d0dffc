import "dotenv/config";
import { writeFile } from "node:fs/promises";
import { ScriptGenerator } from "../agents/script-agent";
import { loadConfig } from "../config";
import { GenerationFailed } from "../lib/errors";
import { setLogLevel } from "../lib/logger";
import { OpenRouterModelClient } from "../lib/openrouter";
import { createTemplateStore, loadTemplateOverrides } from "../lib/prompt-builder";
import { formatViolation } from "../lib/script-validator";

async function main() {
	const [topic, outFile] = process.argv.slice(2);
	if (!topic) {
		console.error('Usage: npm run generate-script -- "<topic>" [out.json]');
		process.exit(1);
	}

	const config = loadConfig(process.env);
	setLogLevel(config.logLevel);

	const generator = new ScriptGenerator({
		config: config.generator,
		client: new OpenRouterModelClient(config.openRouter),
		templates: createTemplateStore(
			config.promptTemplateDir ? await loadTemplateOverrides(config.promptTemplateDir) : {},
		),
	});

	console.log(`=== Generating script: ${topic} ===\n`);

	const document = await generator.generate(topic);
	const json = JSON.stringify(document, null, 2);

	if (outFile) {
		await writeFile(outFile, `${json}\n`, "utf-8");
		console.log(`Wrote ${outFile} (estimated ${document.metadata.duration_estimate}s)`);
	} else {
		console.log(json);
	}
}

main().catch((error) => {
	if (error instanceof GenerationFailed) {
		console.error(error.message);
		for (const violation of error.violations) {
			console.error(`  - ${formatViolation(violation)}`);
		}
	} else {
		console.error("Script generation failed:", error);
	}
	process.exit(1);
});
