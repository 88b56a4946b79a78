// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/packet/magic-packet.ts
// Wake-on-LAN magic packet: 6 bytes 0xFF + MAC address repeated 16 times = 102 bytes.

import { assertContract } from "../exceptions.js";
import { validateHardwareAddress, HARDWARE_ADDRESS_SEPARATOR } from "../validation/hardware-address.js";

export const SYNC_STREAM_LENGTH = 6;
export const HARDWARE_ADDRESS_BYTES = 6;
export const HARDWARE_ADDRESS_REPEAT = 16;
export const MAGIC_PACKET_LENGTH = SYNC_STREAM_LENGTH + HARDWARE_ADDRESS_BYTES * HARDWARE_ADDRESS_REPEAT;

export type HardwareAddress = readonly [number, number, number, number, number, number];

/**
 * Decode a MAC address string that has already passed validateHardwareAddress().
 * Anything else is a caller bug and throws ContractViolationError.
 */
export function parseHardwareAddress(validated: string): HardwareAddress {
  const check = validateHardwareAddress(validated);
  assertContract(check.ok, `parseHardwareAddress() needs a validated MAC address, got '${validated}'`);

  const [a, b, c, d, e, f] = validated
    .split(HARDWARE_ADDRESS_SEPARATOR)
    .map((group) => Number.parseInt(group, 16));
  assertContract(
    a !== undefined && b !== undefined && c !== undefined && d !== undefined && e !== undefined && f !== undefined,
    "MAC address must decode to six bytes",
  );
  return [a, b, c, d, e, f];
}

/**
 * Build a Wake-on-LAN magic packet for the given MAC address.
 * Format: [0xFF × 6] + [MAC × 16] = 102 bytes.
 */
export function buildMagicPacket(address: HardwareAddress): Buffer {
  const packet = Buffer.alloc(MAGIC_PACKET_LENGTH);

  // Sync stream
  packet.fill(0xff, 0, SYNC_STREAM_LENGTH);

  for (let i = 0; i < HARDWARE_ADDRESS_REPEAT; i++) {
    packet.set(address, SYNC_STREAM_LENGTH + i * HARDWARE_ADDRESS_BYTES);
  }

  return packet;
}

/** Hex dump, one 6-byte row per line: the sync stream first, then each MAC repetition. */
export function formatPacket(packet: Uint8Array): string {
  const rows: string[] = [];
  for (let offset = 0; offset < packet.length; offset += HARDWARE_ADDRESS_BYTES) {
    const row = Array.from(packet.subarray(offset, offset + HARDWARE_ADDRESS_BYTES), (byte) =>
      byte.toString(16).toUpperCase().padStart(2, "0"),
    );
    rows.push(`${String(offset).padStart(3, "0")}  ${row.join(" ")}`);
  }
  return rows.join("\n");
}
