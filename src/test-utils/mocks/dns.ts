/**
 * Mock UDP transport answering DNS queries in process
 */

import type { RemoteInfo } from "node:dgram";
import * as dnsPacket from "dns-packet";
import type { UdpTransport, UdpTransportFactory } from "../../probes/transport";

export interface MockDnsBehavior {
  /** How the fake server reacts to each query */
  respond?: "answer" | "silent" | "truncated" | "garbage" | "wrong-id";
  /** Header flags of the answer (low 4 bits are the rcode) */
  flags?: number;
  /** Stay silent for this many queries before answering */
  silentFor?: number;
  /** Reject every send with this error */
  sendError?: Error;
  /** Throw from the factory, as if the socket could not be opened */
  createError?: Error;
}

export interface SentQuery {
  packet: dnsPacket.DecodedPacket;
  port: number;
  address: string;
}

export interface MockUdpTransport extends UdpTransport {
  family: 4 | 6;
  sent: SentQuery[];
  closed: boolean;
}

export interface MockTransportFactory {
  factory: UdpTransportFactory;
  transports: MockUdpTransport[];
}

function remoteInfo(address: string, port: number, family: 4 | 6, size: number): RemoteInfo {
  return { address, port, family: family === 6 ? "IPv6" : "IPv4", size };
}

/**
 * Creates a transport factory whose sockets talk to a fake nameserver
 */
export function createMockTransportFactory(behavior: MockDnsBehavior = {}): MockTransportFactory {
  const transports: MockUdpTransport[] = [];
  let received = 0;

  const factory: UdpTransportFactory = (family) => {
    if (behavior.createError) {
      throw behavior.createError;
    }

    const listeners = new Set<(message: Buffer, from: RemoteInfo) => void>();

    const deliver = (message: Buffer, address: string, port: number) => {
      setImmediate(() => {
        for (const listener of listeners) {
          listener(message, remoteInfo(address, port, family, message.length));
        }
      });
    };

    const transport: MockUdpTransport = {
      family,
      sent: [],
      closed: false,

      async send(packet, port, address) {
        if (behavior.sendError) {
          throw behavior.sendError;
        }

        const query = dnsPacket.decode(packet);
        transport.sent.push({ packet: query, port, address });
        received++;

        const mode = behavior.respond ?? "answer";
        if (mode === "silent" || received <= (behavior.silentFor ?? 0)) return;

        if (mode === "garbage") {
          deliver(Buffer.from([0x01, 0x02, 0x03]), address, port);
          return;
        }

        const flags =
          (behavior.flags ?? 0) | (mode === "truncated" ? dnsPacket.TRUNCATED_RESPONSE : 0);
        const response = dnsPacket.encode({
          type: "response",
          id: mode === "wrong-id" ? ((query.id ?? 0) + 1) % 0x10000 : query.id,
          flags,
          questions: query.questions,
        });
        deliver(response, address, port);
      },

      onMessage(listener) {
        listeners.add(listener);
        return () => {
          listeners.delete(listener);
        };
      },

      close() {
        transport.closed = true;
        listeners.clear();
      },
    };

    transports.push(transport);
    return transport;
  };

  return { factory, transports };
}
