import type { Domain } from "../domain";
import { errorMessage, StorageWriteError } from "../lib/errors";
import { logger } from "../lib/logger";
import type { Event } from "../types";

export interface DrainedDomain {
  domain: Domain;
  events: Event[];
}

/**
 * Writes statistics and events of a batch; must be all-or-nothing
 */
export type BatchWriter = (batch: readonly DrainedDomain[]) => Promise<void>;

/**
 * Drain every persisted domain and hand the batch to the writer.
 * If the writer fails, each domain gets its events back ahead of newer ones.
 *
 * @returns false when no domain could be saved
 * @throws StorageWriteError when the writer fails
 */
export async function flushDomains(domains: readonly Domain[], write: BatchWriter): Promise<boolean> {
  const persisted = domains.filter((domain) => {
    if (domain.rank > 0) return true;
    logger.warn({ domain: domain.name }, "Domain not stored yet, keeping its events queued");
    return false;
  });

  if (persisted.length === 0) return false;

  const batch = persisted.map((domain) => ({ domain, events: domain.drainEvents() }));
  const eventCount = batch.reduce((sum, entry) => sum + entry.events.length, 0);

  try {
    await write(batch);
  } catch (error) {
    for (const { domain, events } of batch) {
      domain.requeueEvents(events);
    }
    const message = `Failed to save ${batch.length} domains: ${errorMessage(error)}`;
    logger.error({ domains: batch.length, events: eventCount }, message);
    throw new StorageWriteError(message, { cause: error });
  }

  logger.debug({ domains: batch.length, events: eventCount }, "Domains saved");
  return true;
}
