// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/net/transport.ts
// Platform seam for datagram I/O. NodeDatagramTransport wraps node:dgram;
// tests substitute an in-process fake.

import { createSocket, type Socket } from "dgram";

/** Resolved IPv4 destination for one datagram. */
export interface Destination {
  address: string;
  /** Network-order bytes of `address`; the datagram is addressed from these. */
  octets: readonly [number, number, number, number];
  port: number;
}

/** One open UDP/IPv4 handle. */
export interface DatagramHandle {
  /** Bind to an ephemeral local port. */
  bind(): Promise<void>;
  setBroadcast(enabled: boolean): void;
  /** Send one datagram; resolves with the number of bytes written. */
  send(payload: Uint8Array, destination: Destination): Promise<number>;
  close(): void;
  readonly isClosed: boolean;
}

export interface DatagramTransport {
  /** Platform network-stack initialization; throws on failure. */
  startup(): void;
  cleanup(): void;
  /** Allocate one UDP/IPv4 handle; throws on failure. */
  openHandle(): DatagramHandle;
}

export class NodeDatagramHandle implements DatagramHandle {
  private closed = false;
  /** Asynchronous socket error; fails the next send. */
  private failure: Error | null = null;

  constructor(private readonly socket: Socket) {
    // Attached for the socket's whole life: an "error" event with no listener throws.
    socket.on("error", (err) => {
      this.failure = err;
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  bind(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => reject(err);
      this.socket.once("error", onError);
      this.socket.bind(() => {
        this.socket.off("error", onError);
        resolve();
      });
    });
  }

  setBroadcast(enabled: boolean): void {
    this.socket.setBroadcast(enabled);
  }

  send(payload: Uint8Array, destination: Destination): Promise<number> {
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.socket.send(payload, destination.port, destination.octets.join("."), (err, bytes) => {
        if (err) reject(err);
        else resolve(bytes);
      });
    });
  }

  close(): void {
    this.closed = true;
    this.socket.close();
  }
}

/**
 * node:dgram transport. libuv initializes sockets on demand, so startup and
 * cleanup have nothing to do on any platform Node runs on.
 */
export class NodeDatagramTransport implements DatagramTransport {
  startup(): void {}

  cleanup(): void {}

  openHandle(): DatagramHandle {
    return new NodeDatagramHandle(createSocket("udp4"));
  }
}
