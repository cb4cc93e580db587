/**
 * Error kinds raised across the probing agent.
 *
 * Only configuration and connection failures at startup stop the process;
 * everything else is scoped to one domain or one flush.
 */

export type DnsProbeErrorCode =
  | "CONFIG_ERROR"
  | "CONNECTION_ERROR"
  | "PROBE_SEND_ERROR"
  | "STORAGE_WRITE_ERROR"
  | "RESOLVER_INIT_ERROR";

export abstract class DnsProbeError extends Error {
  abstract readonly code: DnsProbeErrorCode;
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid configuration (e.g. no database name)
 */
export class ConfigError extends DnsProbeError {
  readonly code = "CONFIG_ERROR";
  readonly fatal = true;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

/**
 * Storage server unreachable or credentials rejected
 */
export class ConnectionError extends DnsProbeError {
  readonly code = "CONNECTION_ERROR";
  readonly fatal = true;
}

/**
 * A probe query could not be dispatched
 */
export class ProbeSendError extends DnsProbeError {
  readonly code = "PROBE_SEND_ERROR";
  readonly fatal = false;

  constructor(
    message: string,
    readonly target: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * A write to storage failed; the data stays queued
 */
export class StorageWriteError extends DnsProbeError {
  readonly code = "STORAGE_WRITE_ERROR";
  readonly fatal = false;
}

/**
 * A probe could not acquire its resolver; only that domain is skipped
 */
export class ResolverInitError extends DnsProbeError {
  readonly code = "RESOLVER_INIT_ERROR";
  readonly fatal = false;

  constructor(
    message: string,
    readonly domain: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isFatal(error: unknown): boolean {
  if (error instanceof DnsProbeError) {
    return error.fatal;
  }
  return true;
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
