import { sqliteTable, text, integer, uniqueIndex, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

export const accounts = sqliteTable(
  "accounts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    username: text("username").notNull(),
    displayName: text("display_name").notNull(),
    deviceSerial: text("device_serial"),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    usernameIdx: uniqueIndex("accounts_username_idx").on(table.username),
  })
);

export const workflowSessions = sqliteTable(
  "workflow_sessions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    accountId: integer("account_id").notNull().references(() => accounts.id),
    workflowType: text("workflow_type", {
      enum: ["feed", "search", "followers", "scrape", "unfollow"],
    }).notNull(),
    target: text("target"),
    status: text("status", { enum: ["running", "completed", "stopped", "failed"] }).notNull().default("running"),
    completionReason: text("completion_reason"),
    configJson: text("config_json").notNull(),
    configHash: text("config_hash").notNull(),
    statsJson: text("stats_json"),
    errorMessage: text("error_message"),
    startedAt: integer("started_at").notNull(),
    endedAt: integer("ended_at"),
  },
  (table) => ({
    accountStartedIdx: index("workflow_sessions_account_started_idx").on(table.accountId, sql`started_at DESC`),
    targetIdx: index("workflow_sessions_target_idx").on(table.accountId, table.target),
  })
);

export const interactions = sqliteTable(
  "interactions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    accountId: integer("account_id").notNull().references(() => accounts.id),
    targetIdentifier: text("target_identifier").notNull(),
    kind: text("kind", {
      enum: ["like", "follow", "favorite", "comment", "share", "dm", "unfollow"],
    }).notNull(),
    success: integer("success", { mode: "boolean" }).notNull().default(false),
    sessionId: integer("session_id").references(() => workflowSessions.id),
    createdAt: integer("created_at").notNull(),
    updatedAt: integer("updated_at").notNull(),
  },
  (table) => ({
    accountTargetKindIdx: uniqueIndex("interactions_account_target_kind_idx").on(
      table.accountId,
      table.targetIdentifier,
      table.kind
    ),
    accountUpdatedIdx: index("interactions_account_updated_idx").on(table.accountId, sql`updated_at DESC`),
  })
);

export const profiles = sqliteTable(
  "profiles",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    username: text("username").notNull(),
    displayName: text("display_name").notNull().default(""),
    followersCount: integer("followers_count"),
    followingCount: integer("following_count"),
    likesCount: integer("likes_count"),
    bio: text("bio").notNull().default(""),
    isPrivate: integer("is_private", { mode: "boolean" }).notNull().default(false),
    isVerified: integer("is_verified", { mode: "boolean" }).notNull().default(false),
    isEnriched: integer("is_enriched", { mode: "boolean" }).notNull().default(false),
    firstSeenAt: integer("first_seen_at").notNull(),
    lastSeenAt: integer("last_seen_at").notNull(),
  },
  (table) => ({
    usernameIdx: uniqueIndex("profiles_username_idx").on(table.username),
  })
);

export const scrapedProfiles = sqliteTable(
  "scraped_profiles",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sessionId: integer("session_id").notNull().references(() => workflowSessions.id),
    profileId: integer("profile_id").notNull().references(() => profiles.id),
    createdAt: integer("created_at").notNull(),
  },
  (table) => ({
    sessionProfileIdx: uniqueIndex("scraped_profiles_session_profile_idx").on(table.sessionId, table.profileId),
  })
);

export type Account = typeof accounts.$inferSelect;
export type NewAccount = typeof accounts.$inferInsert;
export type WorkflowSession = typeof workflowSessions.$inferSelect;
export type NewWorkflowSession = typeof workflowSessions.$inferInsert;
export type Interaction = typeof interactions.$inferSelect;
export type NewInteraction = typeof interactions.$inferInsert;
export type Profile = typeof profiles.$inferSelect;
export type NewProfile = typeof profiles.$inferInsert;
export type ScrapedProfileRow = typeof scrapedProfiles.$inferSelect;
