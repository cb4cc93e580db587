import type { StorageGateway } from "../db/types";
import { type Domain, DomainRegistry } from "../domain";
import { DEFAULT_FLUSH_EVERY_N_PROBES, DEFAULT_PROBE_INTERVAL_MS } from "../lib/config";
import { errorMessage } from "../lib/errors";
import { logger } from "../lib/logger";
import { createProbe, probe } from "../probes";
import type { ProbeBinding, RemoteProbe } from "../probes/types";
import { createMessageQueue } from "./queue";
import { createIntervalSource, createSignalSource } from "./sources";
import type {
  MessageSource,
  VantageMessage,
  VantagePointOptions,
  VantageStartOptions,
  VantageState,
  VantageStats,
} from "./types";

/**
 * Process-wide probing coordinator
 */
export interface VantagePoint {
  /**
   * Load domains, bind probes and probe until stopped
   * @returns false when there was nothing to probe
   */
  start(gateway: StorageGateway, options?: VantageStartOptions): Promise<boolean>;
  /** Deliver a timer tick to the loop */
  tick(): void;
  /** Ask the loop to flush and stop */
  requestStop(reason?: string): void;
  getState(): VantageState;
  getStats(): VantageStats;
  getDomains(): readonly Domain[];
}

const defaultSources = (options: Required<VantageStartOptions>): MessageSource[] => [
  createIntervalSource(options.probeIntervalMs),
  createSignalSource(),
];

/**
 * Create a vantage point.
 *
 * Timer ticks and termination requests are messages on one queue consumed by
 * a single loop, so a flush, a stop and the start of a probe cycle never
 * interleave. Probe cycles themselves run concurrently with the loop.
 *
 * At most one tick waits in the queue; ticks arriving meanwhile (for instance
 * during a slow flush) are dropped. A stop request discards the waiting tick
 * and everything after it is ignored.
 */
export function createVantagePoint(options: VantagePointOptions = {}): VantagePoint {
  const registry = new DomainRegistry();
  const queue = createMessageQueue<VantageMessage>();
  const probes: RemoteProbe[] = [];
  const inFlight = new Set<Promise<void>>();
  const stats: VantageStats = { ticks: 0, cycles: 0, flushes: 0, failedFlushes: 0 };

  const makeProbe =
    options.createProbe ??
    ((binding: ProbeBinding) => createProbe(options.probeKind ?? "dns", binding, options.probeOptions));
  const makeSources = options.sources ?? defaultSources;

  let state: VantageState = "Uninitialized";
  let storage: StorageGateway | null = null;
  let tickCounter = 0;
  let flushEveryNProbes = DEFAULT_FLUSH_EVERY_N_PROBES;
  let detachSources: Array<() => void> = [];
  let tickPending = false;
  let stopRequested = false;

  const deliver = (message: VantageMessage) => {
    if (stopRequested) return;

    if (message.type === "tick") {
      if (tickPending) {
        logger.debug("Tick dropped, previous one still pending");
        return;
      }
      tickPending = true;
      queue.push(message);
      return;
    }

    stopRequested = true;
    tickPending = false;
    queue.clear();
    queue.push(message);
  };

  const flush = async () => {
    if (!storage) return;
    stats.flushes++;
    try {
      await storage.saveDomains(registry.all());
    } catch (error) {
      // Events stay queued in each domain until the next flush
      stats.failedFlushes++;
      logger.error({ error: errorMessage(error) }, "Flush failed, will retry on next flush");
    }
  };

  const runCycle = () => {
    stats.cycles++;
    logger.debug({ cycle: stats.cycles, probes: probes.length }, "Probing all...");

    const cycle: Promise<void> = Promise.allSettled(probes.map((remote) => probe(remote)))
      .then((results) => {
        const failed = results.filter((r) => r.status === "rejected" || !r.value).length;
        if (failed > 0) {
          logger.warn({ failed, total: results.length }, "Probe cycle finished with failures");
        }
      })
      .finally(() => {
        inFlight.delete(cycle);
      });

    inFlight.add(cycle);
  };

  const stop = async (reason: string) => {
    state = "Stopping";
    logger.info({ reason }, "Stopping vantage point...");

    for (const detach of detachSources) detach();
    detachSources = [];
    queue.clear();

    await Promise.allSettled([...inFlight]);
    await flush();

    for (const remote of probes) remote.close();

    state = "Stopped";
    logger.info({ ...stats }, "Vantage point stopped");
  };

  const handleMessage = async (message: VantageMessage) => {
    switch (message.type) {
      case "tick":
        tickPending = false;
        stats.ticks++;
        tickCounter++;
        if (tickCounter >= flushEveryNProbes) {
          await flush();
          tickCounter = 0;
        }
        runCycle();
        break;

      case "stop":
        await stop(message.reason);
        break;

      default: {
        const exhaustive: never = message;
        logger.warn({ message: exhaustive }, "Unknown vantage message");
      }
    }
  };

  return {
    async start(gateway, startOptions = {}) {
      if (state !== "Uninitialized") {
        throw new Error(`Vantage point cannot start from state ${state}`);
      }

      const resolved: Required<VantageStartOptions> = {
        probeIntervalMs: startOptions.probeIntervalMs ?? DEFAULT_PROBE_INTERVAL_MS,
        flushEveryNProbes: startOptions.flushEveryNProbes ?? DEFAULT_FLUSH_EVERY_N_PROBES,
      };
      flushEveryNProbes = resolved.flushEveryNProbes;
      storage = gateway;
      state = "Loading";

      const domains = await gateway.loadDomains();
      if (domains.length === 0) {
        logger.info("No domain to probe.");
        state = "Stopped";
        return false;
      }

      for (const domain of domains) {
        const binding: ProbeBinding = { registry, handle: registry.add(domain) };
        try {
          probes.push(makeProbe(binding));
        } catch (error) {
          // Only this domain goes unprobed
          logger.error(
            { domain: domain.name, error: errorMessage(error) },
            "Cannot start probe for domain",
          );
        }
      }

      if (probes.length === 0) {
        logger.error("No probe could be started");
        state = "Stopped";
        return false;
      }

      detachSources = makeSources(resolved).map((source) => source(deliver));
      state = "Running";
      logger.info(
        { domains: registry.size, probes: probes.length, ...resolved },
        "Vantage point started",
      );

      runCycle();

      while (state === "Running") {
        const message = await queue.next();
        await handleMessage(message);
      }

      return true;
    },

    tick() {
      if (state === "Stopping" || state === "Stopped") return;
      deliver({ type: "tick" });
    },

    requestStop(reason = "requested") {
      if (state === "Stopping" || state === "Stopped") return;
      deliver({ type: "stop", reason });
    },

    getState: () => state,

    getStats: () => ({ ...stats }),

    getDomains: () => registry.all(),
  };
}

export { createMessageQueue, type MessageQueue } from "./queue";
export { createIntervalSource, createSignalSource, TERMINATION_SIGNALS } from "./sources";
export type {
  MessageSource,
  VantageMessage,
  VantagePointOptions,
  VantageStartOptions,
  VantageState,
  VantageStats,
} from "./types";
