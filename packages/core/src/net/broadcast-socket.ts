// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/net/broadcast-socket.ts
// Exclusive owner of one UDP handle. The holder calls close() in a finally block;
// close() is idempotent and replace() closes the previous handle first.

import { assertContract, errorMessage } from "../exceptions.js";
import { fail, ok, SUCCESS, type Result } from "../outcome.js";
import type { DatagramHandle, DatagramTransport, Destination } from "./transport.js";

export class BroadcastSocket {
  private handle: DatagramHandle | null;

  private constructor(handle: DatagramHandle) {
    this.handle = handle;
  }

  static create(transport: DatagramTransport): Result<BroadcastSocket> {
    let handle: DatagramHandle;
    try {
      handle = transport.openHandle();
    } catch (err) {
      return fail("SocketCreationFailed", `Socket creation failed: ${errorMessage(err)}`);
    }
    return ok(new BroadcastSocket(handle));
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  /** Bind to an ephemeral port and set SO_BROADCAST (node:dgram requires a bound socket for this). */
  async enableBroadcast(): Promise<Result> {
    const handle = this.requireOpen();
    try {
      await handle.bind();
      handle.setBroadcast(true);
    } catch (err) {
      return fail("BroadcastSetupFailed", `Could not enable broadcast on the socket: ${errorMessage(err)}`);
    }
    return SUCCESS;
  }

  async send(payload: Uint8Array, destination: Destination): Promise<Result<number>> {
    const handle = this.requireOpen();
    try {
      return ok(await handle.send(payload, destination));
    } catch (err) {
      return fail(
        "PacketSendFailed",
        `Packet send to ${destination.address}:${destination.port} failed: ${errorMessage(err)}`,
      );
    }
  }

  /** Adopt a new, open handle, closing the one currently held. */
  replace(handle: DatagramHandle): void {
    assertContract(handle !== this.handle, "replace() was given the handle it already owns");
    assertContract(!handle.isClosed, "replace() was given a closed handle");
    this.close();
    this.handle = handle;
  }

  close(): void {
    const handle = this.handle;
    if (handle === null) return;
    this.handle = null;
    handle.close();
  }

  private requireOpen(): DatagramHandle {
    assertContract(this.handle !== null, "socket is closed");
    return this.handle;
  }
}
