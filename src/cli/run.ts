import { createMySqlStorageGateway } from "../db/gateway";
import type { StorageGateway } from "../db/types";
import { Domain } from "../domain";
import type { AppConfig } from "../lib/config";
import { errorMessage, isFatal } from "../lib/errors";
import { logger } from "../lib/logger";
import { createVantagePoint, type VantagePoint } from "../scheduler";
import type { CliOptions } from "./args";

export interface AgentDeps {
  gateway?: StorageGateway;
  vantage?: VantagePoint;
}

/**
 * Names from the command line that are not stored yet, without duplicates
 */
export function newDomainNames(requested: readonly string[], stored: readonly Domain[]): string[] {
  const known = new Set(stored.map((d) => d.name));
  const fresh: string[] = [];
  for (const name of requested) {
    if (known.has(name)) {
      logger.info({ domain: name }, "Domain already stored, skipping");
      continue;
    }
    known.add(name);
    fresh.push(name);
  }
  return fresh;
}

async function applyDomainChanges(gateway: StorageGateway, cli: CliOptions): Promise<void> {
  try {
    if (cli.action === "add") {
      const names = newDomainNames(cli.domains, await gateway.loadDomains());
      if (await gateway.addDomains(names.map((name) => new Domain(name)))) {
        logger.info({ domains: names }, `Added ${names.length} domains`);
      }
    } else if (cli.action === "delete") {
      if (await gateway.deleteDomains(cli.domains.map((name) => new Domain(name)))) {
        logger.info({ domains: cli.domains }, `Deleted ${cli.domains.length} domains`);
      }
    }
  } catch (error) {
    if (isFatal(error)) throw error;
    // Probing still starts with whatever is stored
    logger.error({ error: errorMessage(error) }, "Cannot update domains");
  }
}

/**
 * Connect to storage, apply -a/-d and probe until a termination signal.
 *
 * @returns false when there was nothing to probe
 * @throws ConfigError or ConnectionError when storage is unusable
 */
export async function runAgent(
  cli: CliOptions,
  config: AppConfig,
  deps: AgentDeps = {},
): Promise<boolean> {
  const gateway =
    deps.gateway ??
    createMySqlStorageGateway({ host: config.database.host, port: config.database.port });

  await gateway.connect(config.database.name, config.database.user, config.database.password);

  try {
    await applyDomainChanges(gateway, cli);

    const { intervalMs, flushEveryNProbes, ...dns } = config.probe;
    const vantage = deps.vantage ?? createVantagePoint({ probeKind: "dns", probeOptions: { dns } });

    return await vantage.start(gateway, { probeIntervalMs: intervalMs, flushEveryNProbes });
  } finally {
    await gateway.disconnect();
  }
}
