import { describe, expect, test } from "vitest";
import { loadEnvConfig, resolveConfig, validateConfig } from "./config";
import { ConfigError } from "./errors";

function configErrorFrom(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("Expected a ConfigError");
}

describe("loadEnvConfig", () => {
  test("falls back to defaults", () => {
    expect(loadEnvConfig({})).toEqual({
      env: "development",
      logLevel: "debug",
      database: { host: "localhost", port: 3306, name: "dnsprobe", user: "root", password: "" },
      probe: {
        intervalMs: 1000,
        flushEveryNProbes: 4,
        queryClass: "IN",
        queryType: "A",
        recursionDesired: false,
        retries: 2,
        timeoutMs: 2000,
        servers: [],
      },
    });
  });

  test("reads the environment", () => {
    const config = loadEnvConfig({
      NODE_ENV: "production",
      DNSPROBE_DB_HOST: "db.internal",
      DNSPROBE_DB_PORT: "3307",
      DNSPROBE_DB_NAME: "latency",
      DNSPROBE_DB_USER: "probe",
      DNSPROBE_DB_PASSWORD: "test-secret",
      DNSPROBE_DNS_SERVERS: "192.0.2.1,,192.0.2.2",
    });

    expect(config.logLevel).toBe("info");
    expect(config.database).toEqual({
      host: "db.internal",
      port: 3307,
      name: "latency",
      user: "probe",
      password: "test-secret",
    });
    expect(config.probe.servers).toEqual(["192.0.2.1", "192.0.2.2"]);
  });

  test("LOG_LEVEL wins over the environment default", () => {
    expect(loadEnvConfig({ NODE_ENV: "production", LOG_LEVEL: "warn" }).logLevel).toBe("warn");
  });
});

describe("resolveConfig", () => {
  test("command-line overrides replace environment values", () => {
    const config = resolveConfig(
      {
        logLevel: "error",
        database: { name: "latency" },
        probe: { intervalMs: 250, queryType: "AAAA" },
      },
      { DNSPROBE_DB_NAME: "other", DNSPROBE_DB_USER: "probe" },
    );

    expect(config.logLevel).toBe("error");
    expect(config.database.name).toBe("latency");
    expect(config.database.user).toBe("probe");
    expect(config.probe.intervalMs).toBe(250);
    expect(config.probe.queryType).toBe("AAAA");
    expect(config.probe.flushEveryNProbes).toBe(4);
  });

  test("rejects an empty database name", () => {
    const error = configErrorFrom(() => resolveConfig({ database: { name: "" } }, {}));

    expect(error.message).toBe("Invalid configuration");
    expect(error.issues).toEqual(["database.name: Database name is required"]);
    expect(error.fatal).toBe(true);
  });

  test("lists every invalid field", () => {
    const error = configErrorFrom(() =>
      resolveConfig({ probe: { intervalMs: 0, flushEveryNProbes: -1 } }, { DNSPROBE_DB_PORT: "abc" }),
    );

    expect(error.issues).toHaveLength(3);
    expect(error.issues[0]).toBe("database.port: Expected number, received nan");
    expect(error.issues[1]).toMatch(/^probe\.intervalMs: /);
    expect(error.issues[2]).toMatch(/^probe\.flushEveryNProbes: /);
  });

  test("rejects an unknown log level", () => {
    const error = configErrorFrom(() => resolveConfig({}, { LOG_LEVEL: "loud" }));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^logLevel: /);
  });
});

describe("validateConfig", () => {
  test("rejects values that are not a configuration", () => {
    expect(() => validateConfig(null)).toThrow(ConfigError);
  });
});
