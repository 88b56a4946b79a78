// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/sender/sender.ts
// BroadcastSender — one-shot magic packet transmission over UDP broadcast.
//
// parse MAC → build packet → acquire network stack → open socket → enable broadcast
//   → resolve destination → send once → release socket, then stack (finally blocks)
//
// No retry: Wake-on-LAN has no acknowledgement, so retries belong to the caller.

import { assertContract, errorMessage } from "../exceptions.js";
import { createLogger, type Logger } from "../logger.js";
import { fail, ok, type Result } from "../outcome.js";
import { buildMagicPacket, MAGIC_PACKET_LENGTH, parseHardwareAddress } from "../packet/magic-packet.js";
import { BroadcastSocket } from "../net/broadcast-socket.js";
import { resolveDestination } from "../net/destination.js";
import { defaultNetworkStack, NetworkStack, NetworkStackGuard } from "../net/network-stack.js";
import type { DatagramTransport } from "../net/transport.js";

export interface SendReport {
  address: string;
  port: number;
  bytesSent: number;
}

export interface BroadcastSenderOptions {
  /** Transport to send through; gets its own NetworkStack unless `networkStack` is given. */
  transport?: DatagramTransport;
  networkStack?: NetworkStack;
  logger?: Logger;
}

export class BroadcastSender {
  private readonly stack: NetworkStack;
  private readonly logger: Logger;

  constructor(options: BroadcastSenderOptions = {}) {
    this.logger = options.logger ?? createLogger();
    if (options.networkStack) {
      this.stack = options.networkStack;
    } else if (options.transport) {
      this.stack = new NetworkStack(options.transport, this.logger);
    } else {
      this.stack = defaultNetworkStack;
    }
  }

  /**
   * Send one magic packet to `broadcastAddress:port`.
   * Inputs must already be validated (see validateTarget); empty values throw ContractViolationError.
   */
  async sendMagicPacket(hardwareAddress: string, broadcastAddress: string, port: number): Promise<Result<SendReport>> {
    assertContract(hardwareAddress.length > 0, "hardware address must not be empty");
    assertContract(broadcastAddress.length > 0, "broadcast address must not be empty");
    assertContract(port !== 0, "port must not be zero");

    const packet = buildMagicPacket(parseHardwareAddress(hardwareAddress));

    let result: Result<SendReport>;
    try {
      result = await this.transmit(packet, broadcastAddress, port);
    } catch (err) {
      result = fail("UnexpectedFailure", `Unexpected error while sending: ${errorMessage(err)}`);
    }

    if (result.ok) {
      this.logger.debug(`Sent ${result.value.bytesSent} bytes to ${result.value.address}:${result.value.port}`);
    } else {
      this.logger.error(result.detail);
    }
    return result;
  }

  private async transmit(packet: Buffer, broadcastAddress: string, port: number): Promise<Result<SendReport>> {
    const acquired = NetworkStackGuard.acquire(this.stack);
    if (!acquired.ok) return acquired;
    const guard = acquired.value;

    try {
      const created = BroadcastSocket.create(this.stack.transport);
      if (!created.ok) return created;
      const socket = created.value;

      try {
        const broadcast = await socket.enableBroadcast();
        if (!broadcast.ok) return broadcast;

        const destination = resolveDestination(broadcastAddress, port);
        if (!destination.ok) return destination;

        const sent = await socket.send(packet, destination.value);
        if (!sent.ok) return sent;

        if (sent.value !== MAGIC_PACKET_LENGTH) {
          return fail(
            "PacketSendFailed",
            `Short write: ${sent.value} of ${MAGIC_PACKET_LENGTH} bytes sent to ${broadcastAddress}:${port}`,
          );
        }

        return ok({ address: broadcastAddress, port, bytesSent: sent.value });
      } finally {
        socket.close();
      }
    } finally {
      guard.release();
    }
  }
}
