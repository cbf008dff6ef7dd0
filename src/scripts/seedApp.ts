import "dotenv/config";
import crypto from "crypto";
import { loadConfig } from "../config/env";
import { createLogger, errorField } from "../config/logger";
import { createDatabase } from "../config/databaseConnection";
import { apps } from "../schemas/apps.schema";
import { toSeconds } from "../utils/duration";

/**
 * Registers a client app. Name and redirect URL come from the command line:
 *   npm run seed:app -- <name> [redirectURL]
 */
async function seedApp() {
  const [name, redirectURL] = process.argv.slice(2);
  if (!name) {
    throw new Error("usage: seedApp <name> [redirectURL]");
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const { db, pool } = createDatabase(config.databaseUrl, logger);

  const [app] = await db
    .insert(apps)
    .values({
      name,
      secret: crypto.randomBytes(32).toString("base64url"),
      tokenTTL: toSeconds(config.tokenTTL),
      refreshTokenTTL: toSeconds(config.refreshTokenTTL),
      redirectURL: redirectURL ?? null,
    })
    .returning({ id: apps.id, name: apps.name });

  logger.info("✅ App created", { app_id: app.id, name: app.name });

  await pool.end();
}

seedApp().catch((err: unknown) => {
  createLogger().error("❌ Failed to seed app", errorField(err));
  process.exit(1);
});
