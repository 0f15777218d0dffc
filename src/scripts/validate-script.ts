import { readFile } from "node:fs/promises";
import { formatValidationReport, validateScript } from "../lib/script-validator";

const USAGE = "Usage: npm run validate-script -- <script.json> [--allow-unknown-sections]";

async function main() {
	const args = process.argv.slice(2);
	const allowUnknown = args.includes("--allow-unknown-sections");
	const file = args.find((arg) => !arg.startsWith("--"));

	if (!file) {
		console.error(USAGE);
		process.exit(1);
	}

	let candidate: unknown;
	try {
		candidate = JSON.parse(await readFile(file, "utf-8"));
	} catch (error) {
		console.error(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
		process.exit(1);
	}

	const result = validateScript(candidate, { rejectUnknownSections: !allowUnknown });
	console.log(formatValidationReport(result));
	process.exit(result.valid ? 0 : 1);
}

main().catch((error) => {
	console.error("Validation failed:", error);
	process.exit(1);
});
