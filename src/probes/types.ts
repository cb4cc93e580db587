import type { DomainHandle, DomainRegistry } from "../domain";
import type { Reply } from "../types";

/**
 * Probe variants, keyed by the protocol they speak
 */
export type ProbeKind = "dns";

/**
 * Result of one query: the reply is always populated, even on failure
 */
export interface QueryOutcome {
  reply: Reply;
  success: boolean;
  error?: Error;
}

/**
 * Non-owning link between a probe and the domain it measures
 */
export interface ProbeBinding {
  registry: DomainRegistry;
  handle: DomainHandle;
}

/**
 * Capability to issue one query for a bound domain
 */
export interface RemoteProbe {
  readonly kind: ProbeKind;
  readonly binding: ProbeBinding;
  sendQuery(): Promise<QueryOutcome>;
  /** Release sockets and other resources held since construction */
  close(): void;
}
