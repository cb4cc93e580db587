/**
 * In-process StorageGateway for testing
 */

import { flushDomains } from "../../db/flush";
import type { StorageGateway } from "../../db/types";
import { Domain } from "../../domain";
import type { DomainRecord, Event } from "../../types";

export interface InMemoryStorageOptions {
  records?: DomainRecord[];
  /** Number of saveDomains calls that fail before saves succeed */
  failSaves?: number;
}

export interface InMemoryStorage extends StorageGateway {
  records: DomainRecord[];
  measurements: Array<{ domainRank: number; event: Event }>;
  saveCalls: number;
  connected: boolean;
}

export function createInMemoryStorage(options: InMemoryStorageOptions = {}): InMemoryStorage {
  let failuresLeft = options.failSaves ?? 0;
  let nextRank = Math.max(0, ...(options.records ?? []).map((r) => r.rank)) + 1;

  const storage: InMemoryStorage = {
    records: [...(options.records ?? [])],
    measurements: [],
    saveCalls: 0,
    connected: false,

    async connect() {
      storage.connected = true;
      return true;
    },

    async disconnect() {
      const was = storage.connected;
      storage.connected = false;
      return was;
    },

    async loadDomains() {
      return [...storage.records]
        .sort((a, b) => a.rank - b.rank)
        .map((record) => Domain.fromRecord(record));
    },

    async addDomains(domains) {
      if (domains.length === 0) return false;
      for (const domain of domains) {
        storage.records.push({ ...domain.snapshot(), rank: nextRank++ });
      }
      return true;
    },

    async deleteDomains(domains) {
      if (domains.length === 0) return false;
      const names = new Set(domains.map((d) => d.name));
      storage.records = storage.records.filter((r) => !names.has(r.name));
      return true;
    },

    async saveDomains(domains) {
      storage.saveCalls++;
      return flushDomains(domains, async (batch) => {
        if (failuresLeft > 0) {
          failuresLeft--;
          throw new Error("simulated write failure");
        }
        for (const { domain, events } of batch) {
          storage.records = storage.records.map((r) =>
            r.rank === domain.rank ? domain.snapshot() : r,
          );
          for (const event of events) {
            storage.measurements.push({ domainRank: domain.rank, event });
          }
        }
      });
    },
  };

  return storage;
}
