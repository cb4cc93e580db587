import { asc, eq, inArray } from "drizzle-orm";
import type { Domain } from "../domain";
import { ConfigError, errorMessage, StorageWriteError } from "../lib/errors";
import { logger } from "../lib/logger";
import { type DatabaseHandle, type DatabaseOpener, openDatabase } from "./index";
import { flushDomains } from "./flush";
import { domainToRow, eventToRow, rowsToDomains } from "./mapping";
import { domains as domainTable, measurements } from "./schema";
import type { StorageGateway } from "./types";

export interface MySqlGatewayOptions {
  host: string;
  port: number;
  /** Injectable for testing */
  open?: DatabaseOpener;
}

/**
 * StorageGateway backed by the `domain` and `measurement` MySQL tables
 */
export function createMySqlStorageGateway(options: MySqlGatewayOptions): StorageGateway {
  const open = options.open ?? openDatabase;
  let handle: DatabaseHandle | null = null;
  let dbName = "";

  const getHandle = (): DatabaseHandle => {
    if (!handle) {
      throw new Error("Database not connected. Call connect() first.");
    }
    return handle;
  };

  return {
    async connect(name, user, password) {
      dbName = name;
      if (!dbName) {
        const message = "Database name is required. Exiting..";
        logger.fatal(message);
        throw new ConfigError(message, ["database.name: Database name is required"]);
      }

      if (handle) {
        logger.warn({ database: dbName }, "Database already connected");
        return true;
      }

      handle = await open({ host: options.host, port: options.port, name, user, password });
      logger.debug({ database: dbName, user }, `Connected to ${dbName} as ${user}`);
      return true;
    },

    async disconnect() {
      if (!handle) return false;
      const closing = handle;
      handle = null;
      await closing.close();
      logger.debug({ database: dbName }, `Disconnected from ${dbName}`);
      return true;
    },

    async loadDomains() {
      const { db } = getHandle();
      logger.debug("Loading domains");

      try {
        const rows = await db.select().from(domainTable).orderBy(asc(domainTable.rank));
        return rowsToDomains(rows);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Failed to load domains");
        return [];
      }
    },

    async addDomains(domains) {
      if (domains.length === 0) return false;
      const { db } = getHandle();
      const names = domains.map((d) => d.name);

      logger.debug({ domains: names }, "Inserting domains");
      try {
        await db.insert(domainTable).values(domains.map(domainToRow));
      } catch (error) {
        logger.error({ domains: names, error: errorMessage(error) }, "Failed to insert domains");
        throw new StorageWriteError(`Failed to insert domains: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      return true;
    },

    async deleteDomains(domains) {
      if (domains.length === 0) return false;
      const { db } = getHandle();
      const names = domains.map((d) => d.name);

      logger.debug({ domains: names }, "Deleting domains");
      try {
        await db.delete(domainTable).where(inArray(domainTable.name, names));
      } catch (error) {
        logger.error({ domains: names, error: errorMessage(error) }, "Failed to delete domains");
        throw new StorageWriteError(`Failed to delete domains: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      return true;
    },

    async saveDomains(domains: readonly Domain[]) {
      const { db } = getHandle();

      return flushDomains(domains, async (batch) => {
        await db.transaction(async (tx) => {
          for (const { domain } of batch) {
            await tx
              .update(domainTable)
              .set(domainToRow(domain))
              .where(eq(domainTable.rank, domain.rank));
          }

          const rows = batch.flatMap(({ domain, events }) =>
            events.map((event) => eventToRow(event, domain.rank)),
          );
          if (rows.length > 0) {
            await tx.insert(measurements).values(rows);
          }
          logger.debug({ domains: batch.length, measurements: rows.length }, "Inserting measurements");
        });
      });
    },
  };
}
