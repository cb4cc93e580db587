import type { Domain } from "../domain";

/**
 * Persistence of domains and their measurement events.
 *
 * Only `connect` failures are fatal. `loadDomains` reports failures and
 * yields an empty list; the write operations throw StorageWriteError.
 */
export interface StorageGateway {
  /**
   * @throws ConfigError without a database name
   * @throws ConnectionError when the server cannot be reached
   */
  connect(dbName: string, user: string, password: string): Promise<boolean>;
  disconnect(): Promise<boolean>;
  /** Domains ordered by rank */
  loadDomains(): Promise<Domain[]>;
  /** @returns false when there was nothing to add */
  addDomains(domains: readonly Domain[]): Promise<boolean>;
  /** Delete by name; @returns false when there was nothing to delete */
  deleteDomains(domains: readonly Domain[]): Promise<boolean>;
  /**
   * Persist statistics of every stored domain, then drain and persist their
   * pending events. On failure the events are put back for the next call.
   */
  saveDomains(domains: readonly Domain[]): Promise<boolean>;
}
