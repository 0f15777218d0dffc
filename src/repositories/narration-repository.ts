import { asc, eq } from "drizzle-orm";
import { scriptNarrations, type Database } from "../db";
import type { NarrationSegmentResult, NarrationStatus } from "../types/narration";

function toStatus(value: string): NarrationStatus {
	return value === "completed" ? "completed" : "failed";
}

export interface NarrationRepository {
	/** Inserts or replaces the result for one segment of a script. */
	record(scriptId: string, result: NarrationSegmentResult): Promise<void>;
	listByScript(scriptId: string): Promise<NarrationSegmentResult[]>;
}

export class DrizzleNarrationRepository implements NarrationRepository {
	constructor(private readonly db: Database) {}

	async record(scriptId: string, result: NarrationSegmentResult): Promise<void> {
		const values = {
			voice: result.voice,
			status: result.status,
			audioKey: result.audioKey ?? null,
			durationSeconds: result.durationSeconds ?? null,
			captions: result.captions ?? null,
			error: result.error ?? null,
		};

		await this.db
			.insert(scriptNarrations)
			.values({ scriptId, segment: result.segment, ...values })
			.onConflictDoUpdate({
				target: [scriptNarrations.scriptId, scriptNarrations.segment],
				set: values,
			});
	}

	async listByScript(scriptId: string): Promise<NarrationSegmentResult[]> {
		const rows = await this.db
			.select()
			.from(scriptNarrations)
			.where(eq(scriptNarrations.scriptId, scriptId))
			.orderBy(asc(scriptNarrations.createdAt));

		return rows.map((row): NarrationSegmentResult => ({
			segment: row.segment,
			voice: row.voice,
			status: toStatus(row.status),
			...(row.audioKey !== null && { audioKey: row.audioKey }),
			...(row.durationSeconds !== null && { durationSeconds: row.durationSeconds }),
			...(row.captions !== null && { captions: row.captions }),
			...(row.error !== null && { error: row.error }),
		}));
	}
}
