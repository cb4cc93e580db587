import { errorMessage, ProbeSendError } from "../lib/errors";
import { logger } from "../lib/logger";
import { createEvent, nowSeconds } from "../types";
import { createDnsProbe, type DnsProbeDeps, type DnsProbeOptions } from "./dns";
import type { ProbeBinding, ProbeKind, QueryOutcome, RemoteProbe } from "./types";

export interface ProbeFactoryOptions {
  dns?: Partial<DnsProbeOptions>;
  dnsDeps?: Partial<DnsProbeDeps>;
}

/**
 * Create the probe variant for a kind
 * Dispatcher over probe kinds; add new protocols here
 */
export function createProbe(
  kind: ProbeKind,
  binding: ProbeBinding,
  options: ProbeFactoryOptions = {},
): RemoteProbe {
  switch (kind) {
    case "dns":
      return createDnsProbe(binding, options.dns, options.dnsDeps);

    default: {
      // Ensure all cases are handled
      const exhaustive: never = kind;
      throw new Error(`Unknown probe kind: ${exhaustive}`);
    }
  }
}

/**
 * Issue one query and fold the reply into the bound domain.
 *
 * A failed send is logged and its reply is still recorded, so every attempt
 * reaches the event queue.
 *
 * @returns the success flag reported by the probe
 */
export async function probe(remote: RemoteProbe): Promise<boolean> {
  const { registry, handle } = remote.binding;
  const domain = registry.get(handle);

  let outcome: QueryOutcome;
  try {
    outcome = await remote.sendQuery();
  } catch (error) {
    // sendQuery is not expected to throw; record the fault as an Error event
    const failure = new ProbeSendError(`Probe failed: ${errorMessage(error)}`, domain.name, {
      cause: error,
    });
    outcome = {
      reply: createEvent({
        timestamp: nowSeconds(),
        target: domain.name,
        kind: "Error",
        durationMs: null,
      }),
      success: false,
      error: failure,
    };
  }

  if (!outcome.success) {
    logger.error(
      { domain: domain.name, target: outcome.reply.target, error: outcome.error?.message },
      `Cannot send query to ${domain.name}`,
    );
  }

  domain.update(outcome.reply);

  return outcome.success;
}

export { createDnsProbe, DEFAULT_DNS_PROBE_OPTIONS } from "./dns";
export type { DnsProbeDeps, DnsProbeOptions } from "./dns";
export { parseNameserver, resolveNameservers, type Nameserver } from "./nameservers";
export { createUdpTransport, type UdpTransport, type UdpTransportFactory } from "./transport";
export type { ProbeBinding, ProbeKind, QueryOutcome, RemoteProbe } from "./types";
