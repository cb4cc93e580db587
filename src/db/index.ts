/**
 * Database connection (MySQL via drizzle-orm and mysql2)
 */

import { drizzle, type MySql2Database } from "drizzle-orm/mysql2";
import { createPool } from "mysql2/promise";
import type { DatabaseConfig } from "../lib/config";
import { ConnectionError, errorMessage } from "../lib/errors";
import { logger } from "../lib/logger";
import * as schema from "./schema";

export type Database = MySql2Database<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

export type DatabaseOpener = (config: DatabaseConfig) => Promise<DatabaseHandle>;

/**
 * Open a connection pool and check that the server answers
 * @throws ConnectionError if the server cannot be reached
 */
export const openDatabase: DatabaseOpener = async (config) => {
  logger.info(
    { host: config.host, port: config.port, database: config.name, user: config.user },
    "Initializing MySQL database connection...",
  );

  const pool = createPool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.name,
    connectionLimit: 4,
  });

  try {
    await pool.query("SELECT 1");
  } catch (error) {
    await pool.end().catch((endError: unknown) => {
      logger.debug({ error: errorMessage(endError) }, "Failed to close pool after connection error");
    });
    const message = `Cannot connect to ${config.host}.${config.name} as ${config.user}`;
    logger.fatal({ error: errorMessage(error) }, message);
    throw new ConnectionError(message, { cause: error });
  }

  logger.info("MySQL database connection established");

  return {
    db: drizzle(pool, { schema, mode: "default" }),
    close: () => pool.end(),
  };
};

export { schema };
