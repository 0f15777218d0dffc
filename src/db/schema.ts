import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  real,
  jsonb,
  index,
  unique,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import type { ScriptDocument } from "../schemas/script";
import type { CaptionWord } from "../types/narration";

// ============================================================================
// USERS
// ============================================================================

export const users = pgTable("users", {
  id: uuid("id").primaryKey().defaultRandom(),
  username: varchar("username", { length: 255 }).notNull().unique(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

export const usersRelations = relations(users, ({ many }) => ({
  scripts: many(scripts),
}));

// ============================================================================
// SCRIPTS
// ============================================================================

export const scripts = pgTable(
  "scripts",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    title: varchar("title", { length: 255 }).notNull(),
    topic: text("topic").notNull(),
    schemaVersion: varchar("schema_version", { length: 20 }).notNull(),
    content: jsonb("content").$type<ScriptDocument>().notNull(),
    durationEstimate: real("duration_estimate").notNull().default(0),
    createdAt: timestamp("created_at").notNull().defaultNow(),
  },
  (table) => [index("scripts_user_id_idx").on(table.userId, table.createdAt)]
);

export const scriptsRelations = relations(scripts, ({ one, many }) => ({
  user: one(users, {
    fields: [scripts.userId],
    references: [users.id],
  }),
  narrations: many(scriptNarrations),
}));

// ============================================================================
// SCRIPT NARRATIONS (one row per narrated segment)
// ============================================================================

export const scriptNarrations = pgTable(
  "script_narrations",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    scriptId: uuid("script_id")
      .notNull()
      .references(() => scripts.id, { onDelete: "cascade" }),
    segment: varchar("segment", { length: 100 }).notNull(),
    voice: varchar("voice", { length: 100 }).notNull(),
    audioKey: text("audio_key"),
    durationSeconds: real("duration_seconds"),
    captions: jsonb("captions").$type<CaptionWord[]>(),
    status: varchar("status", { length: 50 }).notNull(),
    error: text("error"),
    createdAt: timestamp("created_at").notNull().defaultNow(),
  },
  (table) => [unique("script_narrations_segment_uq").on(table.scriptId, table.segment)]
);

export const scriptNarrationsRelations = relations(scriptNarrations, ({ one }) => ({
  script: one(scripts, {
    fields: [scriptNarrations.scriptId],
    references: [scripts.id],
  }),
}));

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

export type Script = typeof scripts.$inferSelect;
export type NewScript = typeof scripts.$inferInsert;

export type ScriptNarration = typeof scriptNarrations.$inferSelect;
export type NewScriptNarration = typeof scriptNarrations.$inferInsert;
