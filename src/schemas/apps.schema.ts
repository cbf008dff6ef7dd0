import {
  pgTable,
  bigserial,
  varchar,
  integer,
  timestamp,
} from "drizzle-orm/pg-core";

export const apps = pgTable("apps", {
  id: bigserial("id", { mode: "number" }).primaryKey(),

  name: varchar("name", { length: 100 }).notNull().unique(),

  // HMAC key for the access tokens issued to this app
  secret: varchar("secret", { length: 255 }).notNull(),

  tokenTTL: integer("token_ttl").notNull(), // seconds

  refreshTokenTTL: integer("refresh_token_ttl").notNull(), // seconds

  redirectURL: varchar("redirect_url", { length: 2048 }),

  createdAt: timestamp("created_at").defaultNow(),
});
