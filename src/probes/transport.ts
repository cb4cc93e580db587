import { createSocket, type RemoteInfo } from "node:dgram";
import { logger } from "../lib/logger";

/**
 * Minimal datagram transport, injectable for testing
 */
export interface UdpTransport {
  send(packet: Buffer, port: number, address: string): Promise<void>;
  /** Subscribe to incoming datagrams; returns the unsubscribe function */
  onMessage(listener: (message: Buffer, from: RemoteInfo) => void): () => void;
  close(): void;
}

export type UdpTransportFactory = (family: 4 | 6) => UdpTransport;

/**
 * Default transport over a node:dgram socket
 */
export function createUdpTransport(family: 4 | 6): UdpTransport {
  const socket = createSocket(family === 6 ? "udp6" : "udp4");
  let closed = false;

  // An unhandled socket error would crash the process
  socket.on("error", (error) => {
    logger.warn({ family, error: error.message }, "UDP socket error, closing");
    closed = true;
    socket.close();
  });

  return {
    send(packet, port, address) {
      return new Promise((resolve, reject) => {
        if (closed) {
          reject(new Error("Socket is closed"));
          return;
        }
        socket.send(packet, port, address, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },

    onMessage(listener) {
      socket.on("message", listener);
      return () => {
        socket.off("message", listener);
      };
    },

    close() {
      if (closed) return;
      closed = true;
      socket.close();
    },
  };
}
