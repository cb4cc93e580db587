import type { Domain } from "./domain";

/**
 * Non-owning reference to a domain inside its registry
 */
export interface DomainHandle {
  readonly index: number;
}

/**
 * Owns every loaded domain for the process lifetime. Probes keep a handle,
 * never the domain itself.
 */
export class DomainRegistry {
  private readonly domains: Domain[] = [];

  add(domain: Domain): DomainHandle {
    this.domains.push(domain);
    return Object.freeze({ index: this.domains.length - 1 });
  }

  get(handle: DomainHandle): Domain {
    const domain = this.domains[handle.index];
    if (!domain) {
      throw new RangeError(`Unknown domain handle: ${handle.index}`);
    }
    return domain;
  }

  all(): readonly Domain[] {
    return this.domains;
  }

  get size(): number {
    return this.domains.length;
  }
}
