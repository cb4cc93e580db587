/**
 * Domain fixtures for testing
 */

import { Domain, DomainRegistry, type DomainHandle } from "../../domain";
import type { DomainRecord } from "../../types";

export function createDomainRecord(overrides: Partial<DomainRecord> = {}): DomainRecord {
  return {
    rank: 1,
    name: "example.com",
    queryTimeAvg: 0,
    queryTimeStdDev: 0,
    queryCount: 0,
    timeFirst: 0,
    timeLast: 0,
    ...overrides,
  };
}

export interface BoundDomain {
  registry: DomainRegistry;
  handle: DomainHandle;
  domain: Domain;
}

/**
 * Register a fresh domain and return its binding
 */
export function bindDomain(name = "example.com", registry = new DomainRegistry()): BoundDomain {
  const domain = new Domain(name);
  const handle = registry.add(domain);
  return { registry, handle, domain };
}
