import type { ProbeFactoryOptions } from "../probes";
import type { ProbeBinding, ProbeKind, RemoteProbe } from "../probes/types";

/**
 * Vantage point lifecycle; Stopped is terminal
 */
export type VantageState = "Uninitialized" | "Loading" | "Running" | "Stopping" | "Stopped";

/**
 * Everything the coordinator loop reacts to
 */
export type VantageMessage = { type: "tick" } | { type: "stop"; reason: string };

/**
 * A producer of messages (timer, signals). Attaching starts it; the returned
 * function detaches it.
 */
export type MessageSource = (emit: (message: VantageMessage) => void) => () => void;

export interface VantageStartOptions {
  probeIntervalMs?: number;
  flushEveryNProbes?: number;
}

export interface VantagePointOptions {
  probeKind?: ProbeKind;
  probeOptions?: ProbeFactoryOptions;
  /** Replaces the probe factory, mainly for testing */
  createProbe?: (binding: ProbeBinding) => RemoteProbe;
  /** Message sources to attach once running; defaults to interval timer plus signals */
  sources?: (options: Required<VantageStartOptions>) => MessageSource[];
}

/**
 * Counters exposed for logging and tests
 */
export interface VantageStats {
  ticks: number;
  cycles: number;
  flushes: number;
  failedFlushes: number;
}
