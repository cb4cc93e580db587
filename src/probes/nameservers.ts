import { getServers } from "node:dns";
import { isIP } from "node:net";

export const DNS_PORT = 53;

export interface Nameserver {
  address: string;
  port: number;
  family: 4 | 6;
}

/**
 * Parse a resolver address as returned by dns.getServers():
 * "1.1.1.1", "1.1.1.1:5353", "2001:db8::1" or "[2001:db8::1]:5353"
 */
export function parseNameserver(server: string): Nameserver | null {
  const trimmed = server.trim();

  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
  if (bracketed) {
    const address = bracketed[1] ?? "";
    const port = bracketed[2] ? parseInt(bracketed[2], 10) : DNS_PORT;
    return isIP(address) === 6 && isValidPort(port) ? { address, port, family: 6 } : null;
  }

  const family = isIP(trimmed);
  if (family === 4 || family === 6) {
    return { address: trimmed, port: DNS_PORT, family };
  }

  const withPort = /^([^:]+):(\d+)$/.exec(trimmed);
  if (withPort) {
    const address = withPort[1] ?? "";
    const port = parseInt(withPort[2] ?? "", 10);
    return isIP(address) === 4 && isValidPort(port) ? { address, port, family: 4 } : null;
  }

  return null;
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port > 0 && port <= 65535;
}

/**
 * Configured servers, or the system resolvers when none are configured
 */
export function resolveNameservers(configured: readonly string[], systemServers: () => string[] = getServers): Nameserver[] {
  const candidates = configured.length > 0 ? configured : systemServers();
  const parsed: Nameserver[] = [];
  for (const candidate of candidates) {
    const nameserver = parseNameserver(candidate);
    if (nameserver) parsed.push(nameserver);
  }
  return parsed;
}
