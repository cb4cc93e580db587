import { randomInt } from "node:crypto";
import type { RemoteInfo } from "node:dgram";
import * as dnsPacket from "dns-packet";
import { DEFAULT_DNS_RETRY, DEFAULT_DNS_TIMEOUT_MS, type ProbeConfig } from "../lib/config";
import { errorMessage, ProbeSendError, ResolverInitError } from "../lib/errors";
import { logger } from "../lib/logger";
import { createEvent, nowSeconds, type Reply } from "../types";
import { type Nameserver, resolveNameservers } from "./nameservers";
import { createUdpTransport, type UdpTransport, type UdpTransportFactory } from "./transport";
import type { ProbeBinding, QueryOutcome, RemoteProbe } from "./types";

export type DnsProbeOptions = Pick<
  ProbeConfig,
  "queryClass" | "queryType" | "recursionDesired" | "retries" | "timeoutMs" | "servers"
>;

export const DEFAULT_DNS_PROBE_OPTIONS: DnsProbeOptions = {
  queryClass: "IN",
  queryType: "A",
  recursionDesired: false,
  retries: DEFAULT_DNS_RETRY,
  timeoutMs: DEFAULT_DNS_TIMEOUT_MS,
  servers: [],
};

// Low four bits of the header flags
const RCODE_MASK = 0x0f;

/**
 * Dependencies that tests replace
 */
export interface DnsProbeDeps {
  transportFactory: UdpTransportFactory;
  systemServers?: () => string[];
  nextQueryId: () => number;
}

const defaultDeps: DnsProbeDeps = {
  transportFactory: createUdpTransport,
  nextQueryId: () => randomInt(0, 0x10000),
};

/**
 * A response packet that matched an outstanding query
 */
interface DnsAnswer {
  status: "OK" | "TRUNCATED";
  rcode: number;
  server: string;
  rttMs: number;
  receivedAt: number;
}

/**
 * Create a DNS probe bound to one domain.
 *
 * The nameserver list and one UDP socket per address family are acquired here
 * and held until close().
 *
 * @throws ResolverInitError when no usable nameserver or socket is available
 */
export function createDnsProbe(
  binding: ProbeBinding,
  options: Partial<DnsProbeOptions> = {},
  deps: Partial<DnsProbeDeps> = {},
): RemoteProbe {
  const opts: DnsProbeOptions = { ...DEFAULT_DNS_PROBE_OPTIONS, ...options };
  const { transportFactory, systemServers, nextQueryId } = { ...defaultDeps, ...deps };
  const domainName = binding.registry.get(binding.handle).name;

  const nameservers = resolveNameservers(opts.servers, systemServers);
  if (nameservers.length === 0) {
    const message = "Cannot create a resolver: no nameserver available";
    logger.error({ domain: domainName }, message);
    throw new ResolverInitError(message, domainName);
  }

  const transports = new Map<4 | 6, UdpTransport>();
  try {
    for (const nameserver of nameservers) {
      if (!transports.has(nameserver.family)) {
        transports.set(nameserver.family, transportFactory(nameserver.family));
      }
    }
  } catch (error) {
    for (const transport of transports.values()) transport.close();
    logger.error({ domain: domainName, error: errorMessage(error) }, "Cannot create a resolver");
    throw new ResolverInitError(`Cannot create a resolver: ${errorMessage(error)}`, domainName, {
      cause: error,
    });
  }

  let closed = false;

  const encodeQuery = (id: number, target: string): Buffer =>
    dnsPacket.encode({
      type: "query",
      id,
      flags: opts.recursionDesired ? dnsPacket.RECURSION_DESIRED : 0,
      questions: [{ type: opts.queryType, name: target, class: opts.queryClass }],
    });

  /**
   * Send one query to one nameserver and wait for the matching response
   * @returns the answer, or null when the attempt timed out
   */
  const attempt = (
    transport: UdpTransport,
    nameserver: Nameserver,
    target: string,
  ): Promise<DnsAnswer | null> => {
    const id = nextQueryId();
    const query = encodeQuery(id, target);

    return new Promise((resolve, reject) => {
      let settled = false;
      const sentAt = performance.now();

      const finish = (answer: DnsAnswer | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutHandle);
        unsubscribe();
        resolve(answer);
      };

      const onMessage = (message: Buffer, from: RemoteInfo) => {
        if (from.address !== nameserver.address) return;

        let packet: dnsPacket.DecodedPacket;
        try {
          packet = dnsPacket.decode(message);
        } catch (error) {
          logger.debug({ target, error: errorMessage(error) }, "Ignoring malformed DNS packet");
          return;
        }
        if (packet.id !== id || !packet.flag_qr) return;

        finish({
          status: packet.flag_tc ? "TRUNCATED" : "OK",
          rcode: (packet.flags ?? 0) & RCODE_MASK,
          server: nameserver.address,
          rttMs: performance.now() - sentAt,
          receivedAt: Date.now(),
        });
      };

      const unsubscribe = transport.onMessage(onMessage);
      const timeoutHandle = setTimeout(() => finish(null), opts.timeoutMs);

      transport.send(query, nameserver.port, nameserver.address).catch((error: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutHandle);
        unsubscribe();
        reject(error);
      });
    });
  };

  /**
   * Query each nameserver in turn, up to `retries` rounds
   */
  const resolve = async (target: string): Promise<DnsAnswer | null> => {
    for (let round = 0; round < opts.retries; round++) {
      for (const nameserver of nameservers) {
        const transport = transports.get(nameserver.family);
        if (!transport) continue;

        const answer = await attempt(transport, nameserver, target);
        if (answer) return answer;

        logger.debug({ target, server: nameserver.address, round }, "DNS attempt timed out");
      }
    }
    return null;
  };

  return {
    kind: "dns",
    binding,

    async sendQuery(): Promise<QueryOutcome> {
      const domain = binding.registry.get(binding.handle);
      const target = `${domain.generateProbeTarget()}.${domain.name}`;

      // The request itself is the event unless a response replaces it
      const request: Reply = createEvent({
        timestamp: nowSeconds(),
        target,
        kind: "SendRequest",
        durationMs: null,
      });

      if (closed) {
        return {
          reply: request,
          success: false,
          error: new ProbeSendError("Probe is closed", target),
        };
      }

      logger.info({ target }, "Sending query");

      const startedAt = performance.now();
      let answer: DnsAnswer | null;
      try {
        answer = await resolve(target);
      } catch (error) {
        return {
          reply: createEvent({ ...request, durationMs: performance.now() - startedAt }),
          success: false,
          error: new ProbeSendError(`Cannot send query: ${errorMessage(error)}`, target, {
            cause: error,
          }),
        };
      }
      const wallClockMs = performance.now() - startedAt;

      if (!answer) {
        logger.info({ target, durationMs: wallClockMs }, "No answer");
        return {
          reply: createEvent({ ...request, durationMs: wallClockMs }),
          success: true,
        };
      }

      const reply =
        answer.status === "OK"
          ? createEvent({
              timestamp: nowSeconds(answer.receivedAt),
              target,
              kind: "ReceiveData",
              durationMs: answer.rttMs,
            })
          : createEvent({ ...request, kind: "ReceiveData", durationMs: wallClockMs });

      logger.info(
        {
          target,
          server: answer.server,
          status: answer.status,
          rcode: answer.rcode,
          durationMs: reply.durationMs,
        },
        "Got answer",
      );

      return { reply, success: true };
    },

    close() {
      if (closed) return;
      closed = true;
      logger.debug({ domain: domainName }, "Releasing resolver resources");
      for (const transport of transports.values()) {
        transport.close();
      }
      transports.clear();
    },
  };
}
