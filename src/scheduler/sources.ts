import { logger } from "../lib/logger";
import type { MessageSource } from "./types";

export const TERMINATION_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGHUP", "SIGTERM"];

/**
 * Emits a tick every `intervalMs`
 */
export function createIntervalSource(intervalMs: number): MessageSource {
  return (emit) => {
    const timer = setInterval(() => emit({ type: "tick" }), intervalMs);
    return () => clearInterval(timer);
  };
}

/**
 * Minimal signal emitter, satisfied by `process`
 */
export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Turns termination signals into a stop request
 */
export function createSignalSource(
  signals: NodeJS.Signals[] = TERMINATION_SIGNALS,
  target: SignalTarget = process,
): MessageSource {
  return (emit) => {
    const listener = (signal: NodeJS.Signals) => {
      logger.debug({ signal }, "Application interrupted.");
      emit({ type: "stop", reason: signal });
    };
    for (const signal of signals) {
      target.on(signal, listener);
    }
    return () => {
      for (const signal of signals) {
        target.off(signal, listener);
      }
    };
  };
}
