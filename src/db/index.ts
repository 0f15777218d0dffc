import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { log } from "../lib/logger";
import * as schema from "./schema";

export * from "./schema";

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
	db: Database;
	close(): Promise<void>;
}

export function createDatabase(connectionString: string): DatabaseHandle {
	const pool = new Pool({ connectionString });

	pool.on("error", (err) => {
		log.db.error("Idle client error", { error: err.message });
	});

	return {
		db: drizzle(pool, { schema }),
		close: () => pool.end(),
	};
}
