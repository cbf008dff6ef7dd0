import {
  pgTable,
  pgEnum,
  bigserial,
  bigint,
  varchar,
  timestamp,
  index,
} from "drizzle-orm/pg-core";
import { apps } from "./apps.schema";
import { ACCOUNT_STATUSES, ROLES } from "../types/role";

export const accountRoleEnum = pgEnum("account_role_enum", ROLES);

export const accountStatusEnum = pgEnum("account_status_enum", ACCOUNT_STATUSES);

export const accounts = pgTable(
  "accounts",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),

    email: varchar("email", { length: 150 }).notNull().unique(),

    passHash: varchar("pass_hash", { length: 255 }).notNull(),

    role: accountRoleEnum("role").notNull().default("user"),

    status: accountStatusEnum("status").notNull().default("ACTIVE"),

    appId: bigint("app_id", { mode: "number" })
      .notNull()
      .references(() => apps.id),

    createdAt: timestamp("created_at").defaultNow(),
  },
  (table) => ({
    appIdx: index("idx_accounts_app").on(table.appId),
  })
);
