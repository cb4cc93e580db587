import type { RecordType } from "dns-packet";
import { z } from "zod";
import { ConfigError } from "./errors";
import { logger } from "./logger";

export const DEFAULT_PROBE_INTERVAL_MS = 1000;
export const DEFAULT_FLUSH_EVERY_N_PROBES = 4;
export const DEFAULT_DNS_RETRY = 2;
export const DEFAULT_DNS_TIMEOUT_MS = 2000;

export const DNS_QUERY_CLASSES = ["IN", "CS", "CH", "HS", "ANY"] as const;
export const DNS_QUERY_TYPES = [
  "A",
  "AAAA",
  "CNAME",
  "MX",
  "NS",
  "SOA",
  "TXT",
  "SRV",
  "PTR",
] as const satisfies readonly RecordType[];

export const DatabaseConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  name: z.string().min(1, "Database name is required"),
  user: z.string(),
  password: z.string(),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

export const ProbeConfigSchema = z.object({
  intervalMs: z.number().int().positive(),
  flushEveryNProbes: z.number().int().positive(),
  queryClass: z.enum(DNS_QUERY_CLASSES),
  queryType: z.enum(DNS_QUERY_TYPES),
  recursionDesired: z.boolean(),
  retries: z.number().int().min(1),
  timeoutMs: z.number().int().positive(),
  // Empty list means the system resolvers
  servers: z.array(z.string().min(1)),
});

export type ProbeConfig = z.infer<typeof ProbeConfigSchema>;

export const AppConfigSchema = z.object({
  env: z.string(),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]),
  database: DatabaseConfigSchema,
  probe: ProbeConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Configuration before validation; the log level is still free text
 */
export type RawAppConfig = Omit<AppConfig, "logLevel"> & { logLevel: string };

/**
 * Overrides coming from the command line
 */
export interface ConfigOverrides {
  logLevel?: string;
  database?: Partial<DatabaseConfig>;
  probe?: Partial<ProbeConfig>;
}

type Env = Record<string, string | undefined>;

/**
 * Defaults derived from the environment
 */
export function loadEnvConfig(env: Env = process.env): RawAppConfig {
  const nodeEnv = env.NODE_ENV || "development";
  const logLevel = env.LOG_LEVEL || (nodeEnv === "production" ? "info" : "debug");

  return {
    env: nodeEnv,
    logLevel,
    database: {
      host: env.DNSPROBE_DB_HOST || "localhost",
      port: parseInt(env.DNSPROBE_DB_PORT || "3306", 10),
      name: env.DNSPROBE_DB_NAME ?? "dnsprobe",
      user: env.DNSPROBE_DB_USER ?? "root",
      password: env.DNSPROBE_DB_PASSWORD ?? "",
    },
    probe: {
      intervalMs: DEFAULT_PROBE_INTERVAL_MS,
      flushEveryNProbes: DEFAULT_FLUSH_EVERY_N_PROBES,
      queryClass: "IN",
      queryType: "A",
      recursionDesired: false,
      retries: DEFAULT_DNS_RETRY,
      timeoutMs: DEFAULT_DNS_TIMEOUT_MS,
      servers: env.DNSPROBE_DNS_SERVERS ? env.DNSPROBE_DNS_SERVERS.split(",").filter(Boolean) : [],
    },
  };
}

/**
 * Merge command-line overrides over environment defaults and validate the result
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): AppConfig {
  const base = loadEnvConfig(env);
  const merged: RawAppConfig = {
    ...base,
    logLevel: overrides.logLevel ?? base.logLevel,
    database: { ...base.database, ...overrides.database },
    probe: { ...base.probe, ...overrides.probe },
  };

  return validateConfig(merged);
}

export function validateConfig(candidate: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(candidate);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    logger.error("Configuration errors:");
    for (const e of issues) {
      logger.error(`  - ${e}`);
    }
    throw new ConfigError("Invalid configuration", issues);
  }

  logger.debug(
    {
      env: result.data.env,
      database: result.data.database.name,
      host: result.data.database.host,
      intervalMs: result.data.probe.intervalMs,
      flushEveryNProbes: result.data.probe.flushEveryNProbes,
    },
    "Configuration loaded",
  );

  return result.data;
}
