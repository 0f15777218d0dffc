import { and, desc, eq } from "drizzle-orm";
import { scripts, type Database } from "../db";
import type { ScriptDocument } from "../schemas/script";

export interface StoredScript {
	id: string;
	ownerId: string;
	title: string;
	topic: string;
	schemaVersion: string;
	document: ScriptDocument;
	createdAt: Date;
}

export interface ScriptSummary {
	id: string;
	title: string;
	topic: string;
	durationEstimate: number;
	createdAt: Date;
}

/** Owner-scoped storage: another owner's id behaves exactly like a missing one. */
export interface ScriptRepository {
	save(ownerId: string, document: ScriptDocument): Promise<string>;
	load(ownerId: string, id: string): Promise<StoredScript | null>;
	delete(ownerId: string, id: string): Promise<boolean>;
	list(ownerId: string): Promise<ScriptSummary[]>;
}

const MAX_TITLE_LENGTH = 255;

export function scriptTitle(document: ScriptDocument): string {
	return document.metadata.topic.slice(0, MAX_TITLE_LENGTH);
}

export class DrizzleScriptRepository implements ScriptRepository {
	constructor(private readonly db: Database) {}

	async save(ownerId: string, document: ScriptDocument): Promise<string> {
		const [row] = await this.db
			.insert(scripts)
			.values({
				userId: ownerId,
				title: scriptTitle(document),
				topic: document.metadata.topic,
				schemaVersion: document.metadata.version,
				content: document,
				durationEstimate: document.metadata.duration_estimate,
			})
			.returning({ id: scripts.id });

		return row.id;
	}

	async load(ownerId: string, id: string): Promise<StoredScript | null> {
		const [row] = await this.db
			.select()
			.from(scripts)
			.where(and(eq(scripts.id, id), eq(scripts.userId, ownerId)))
			.limit(1);

		if (!row) return null;
		return {
			id: row.id,
			ownerId: row.userId,
			title: row.title,
			topic: row.topic,
			schemaVersion: row.schemaVersion,
			document: row.content,
			createdAt: row.createdAt,
		};
	}

	async delete(ownerId: string, id: string): Promise<boolean> {
		const deleted = await this.db
			.delete(scripts)
			.where(and(eq(scripts.id, id), eq(scripts.userId, ownerId)))
			.returning({ id: scripts.id });

		return deleted.length > 0;
	}

	async list(ownerId: string): Promise<ScriptSummary[]> {
		return this.db
			.select({
				id: scripts.id,
				title: scripts.title,
				topic: scripts.topic,
				durationEstimate: scripts.durationEstimate,
				createdAt: scripts.createdAt,
			})
			.from(scripts)
			.where(eq(scripts.userId, ownerId))
			.orderBy(desc(scripts.createdAt));
	}
}
