/**
 * Command-line parsing for the probing agent
 *
 * Usage:
 *   dnsprobe [-a|-d] [-b db] [-u user] [-p password] [-t ms] [-v level] [-f ticks] [domain ...]
 */

import { parseArgs } from "node:util";
import { type ConfigOverrides, DNS_QUERY_CLASSES, DNS_QUERY_TYPES } from "../lib/config";
import { errorMessage } from "../lib/errors";
import { verbosityToLevel } from "../lib/logger";

export const USAGE = `Usage: dnsprobe [options] [domain ...]

Options:
  -a, --add               add the listed domains, then start probing
  -d, --delete            delete the listed domains, then start probing
  -b, --database <name>   database name
  -u, --user <user>       database user
  -p, --password <pass>   database password
      --host <host>       database host
      --port <port>       database port
  -t, --interval <ms>     delay between probe cycles in milliseconds (default 1000)
  -f, --flush <ticks>     save statistics every N probe cycles (default 4)
  -v, --verbosity <0-4>   0=debug 1=info 2=warn 3=error 4=fatal
      --query-class <c>   DNS query class (default IN)
      --query-type <t>    DNS query type (default A)
      --server <ip,...>   nameservers to query instead of the system resolvers
      --recursive         set the recursion desired flag
  -h, --help              show this help`;

export type CliAction = "probe" | "add" | "delete";

export interface CliOptions {
  action: CliAction;
  domains: string[];
  overrides: ConfigOverrides;
}

export type CliParseResult =
  | { type: "run"; options: CliOptions }
  | { type: "help" }
  | { type: "invalid"; message: string };

class UsageError extends Error {}

function parseInteger(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new UsageError(`Invalid value for ${flag}: ${value}`);
  }
  return parsed;
}

function parseChoice<T extends string>(
  flag: string,
  value: string | undefined,
  choices: readonly T[],
): T | undefined {
  if (value === undefined) return undefined;
  const upper = value.toUpperCase();
  const match = choices.find((choice) => choice === upper);
  if (!match) {
    throw new UsageError(`Invalid value for ${flag}: ${value} (expected one of ${choices.join(", ")})`);
  }
  return match;
}

/**
 * Parse arguments (without the node executable and script path)
 */
export function parseCliArgs(argv: string[]): CliParseResult {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        add: { type: "boolean", short: "a" },
        delete: { type: "boolean", short: "d" },
        database: { type: "string", short: "b" },
        user: { type: "string", short: "u" },
        password: { type: "string", short: "p" },
        host: { type: "string" },
        port: { type: "string" },
        interval: { type: "string", short: "t" },
        flush: { type: "string", short: "f" },
        verbosity: { type: "string", short: "v" },
        "query-class": { type: "string" },
        "query-type": { type: "string" },
        server: { type: "string", multiple: true },
        recursive: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });

    if (values.help) {
      return { type: "help" };
    }

    if (values.add && values.delete) {
      throw new UsageError("Options -a and -d cannot be combined");
    }

    const action: CliAction = values.add ? "add" : values.delete ? "delete" : "probe";
    if (action !== "probe" && positionals.length === 0) {
      throw new UsageError(`No domain given for -${action === "add" ? "a" : "d"}`);
    }
    if (action === "probe" && positionals.length > 0) {
      throw new UsageError("Domains are only accepted together with -a or -d");
    }

    const verbosity = parseInteger("-v", values.verbosity);
    if (verbosity !== undefined && verbosity < 0) {
      throw new UsageError(`Invalid value for -v: ${verbosity}`);
    }

    const servers = values.server
      ?.flatMap((entry) => entry.split(","))
      .map((entry) => entry.trim())
      .filter(Boolean);

    const port = parseInteger("--port", values.port);
    const intervalMs = parseInteger("-t", values.interval);
    const flushEveryNProbes = parseInteger("-f", values.flush);
    const queryClass = parseChoice("--query-class", values["query-class"], DNS_QUERY_CLASSES);
    const queryType = parseChoice("--query-type", values["query-type"], DNS_QUERY_TYPES);

    // Unset flags must not mask environment defaults
    const overrides: ConfigOverrides = {
      database: {
        ...(values.database !== undefined && { name: values.database }),
        ...(values.user !== undefined && { user: values.user }),
        ...(values.password !== undefined && { password: values.password }),
        ...(values.host !== undefined && { host: values.host }),
        ...(port !== undefined && { port }),
      },
      probe: {
        ...(intervalMs !== undefined && { intervalMs }),
        ...(flushEveryNProbes !== undefined && { flushEveryNProbes }),
        ...(queryClass && { queryClass }),
        ...(queryType && { queryType }),
        ...(values.recursive && { recursionDesired: true }),
        ...(servers && servers.length > 0 && { servers }),
      },
    };
    if (verbosity !== undefined) {
      overrides.logLevel = verbosityToLevel(verbosity);
    }

    return { type: "run", options: { action, domains: positionals, overrides } };
  } catch (error) {
    return { type: "invalid", message: errorMessage(error) };
  }
}
