import {
  pgTable,
  uuid,
  bigint,
  varchar,
  text,
  timestamp,
  index,
} from "drizzle-orm/pg-core";
import { accounts } from "./accounts.schema";

export const USER_AGENT_MAX_LENGTH = 512;
export const IP_ADDRESS_MAX_LENGTH = 64;

export const sessions = pgTable(
  "sessions",
  {
    id: uuid("id").defaultRandom().primaryKey(),

    accountId: bigint("account_id", { mode: "number" })
      .notNull()
      .references(() => accounts.id, { onDelete: "cascade" }),

    userAgent: varchar("user_agent", { length: USER_AGENT_MAX_LENGTH }).notNull().default(""),

    ipAddress: varchar("ip_address", { length: IP_ADDRESS_MAX_LENGTH }).notNull().default(""),

    token: text("token").notNull().unique(),

    refreshToken: varchar("refresh_token", { length: 128 }).notNull().unique(),

    expiresAt: timestamp("expires_at").notNull(),

    refreshExpiresAt: timestamp("refresh_expires_at").notNull(),

    revokedAt: timestamp("revoked_at"), // soft revoke; revoked rows are never read back

    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    accountIdx: index("idx_sessions_account").on(table.accountId),

    refreshExpiresIdx: index("idx_sessions_refresh_expires_at").on(table.refreshExpiresAt),
  })
);
