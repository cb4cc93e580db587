/**
 * Scripted RemoteProbe for testing the fold and the scheduler
 */

import type { ProbeBinding, QueryOutcome, RemoteProbe } from "../../probes/types";
import { createEvent, type EventKind } from "../../types";

export interface FakeProbeScript {
  success?: boolean;
  kind?: EventKind;
  durationMs?: number | null;
  throws?: Error;
  /** Resolve the query only after this many milliseconds */
  delayMs?: number;
}

export interface FakeProbe extends RemoteProbe {
  calls: number;
  closed: boolean;
}

export function createFakeProbe(binding: ProbeBinding, script: FakeProbeScript = {}): FakeProbe {
  const fake: FakeProbe = {
    kind: "dns",
    binding,
    calls: 0,
    closed: false,

    async sendQuery(): Promise<QueryOutcome> {
      fake.calls++;
      if (script.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, script.delayMs));
      }
      if (script.throws) {
        throw script.throws;
      }

      const domain = binding.registry.get(binding.handle);
      const success = script.success ?? true;
      return {
        reply: createEvent({
          timestamp: 1_700_000_000 + fake.calls,
          target: `probe${fake.calls}.${domain.name}`,
          kind: script.kind ?? (success ? "ReceiveData" : "SendRequest"),
          durationMs: script.durationMs === undefined ? 10 * fake.calls : script.durationMs,
        }),
        success,
        error: success ? undefined : new Error("scripted failure"),
      };
    },

    close() {
      fake.closed = true;
    },
  };
  return fake;
}
