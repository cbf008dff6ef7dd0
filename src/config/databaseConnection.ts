import { Pool } from "pg";
import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";
import { Logger, errorField } from "./logger";

export type Database = NodePgDatabase;

export interface DatabaseConnection {
  db: Database;
  pool: Pool;
  checkDbConnection: () => Promise<void>;
}

const isLocalDatabase = (url: string) => url.includes("localhost") || url.includes("127.0.0.1");

// local PostgreSQL usually runs without SSL, so drop any SSL parameters from the URL
const stripSslParams = (url: string) =>
  url
    .replace(/[?&]sslmode=[^&]*/gi, "")
    .replace(/[?&]ssl=[^&]*/gi, "")
    .replace(/[?&]channel_binding=[^&]*/gi, "");

export const createDatabase = (databaseUrl: string, logger: Logger): DatabaseConnection => {
  const isLocalhost = isLocalDatabase(databaseUrl);
  const connectionString = isLocalhost ? stripSslParams(databaseUrl) : databaseUrl;

  // Remote/cloud databases: require SSL without verifying the provider certificate
  const ssl: boolean | { rejectUnauthorized: boolean } = isLocalhost
    ? false
    : { rejectUnauthorized: false };

  logger.debug("database ssl configuration", { ssl: ssl !== false, local: isLocalhost });

  const pool = new Pool({ connectionString, ssl });

  pool.on("error", (err) => {
    logger.error("unexpected database pool error", errorField(err));
  });

  pool.on("connect", () => {
    logger.debug("database pool connection established");
  });

  const checkDbConnection = async () => {
    try {
      const result = await pool.query<{ current_database: string }>("SELECT current_database()");
      logger.info("connected to database", { database: result.rows[0]?.current_database });
    } catch (error) {
      logger.error("database connection error", errorField(error));
      throw error;
    }
  };

  return { db: drizzle(pool), pool, checkDbConnection };
};
