// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/validation/broadcast-address.ts
// Dotted-decimal IPv4 syntax for the broadcast target: exactly four octets, three dots.

import { fail, SUCCESS, type Result } from "../outcome.js";

export const OCTET_COUNT = 4;
const DOT_COUNT = OCTET_COUNT - 1;
const MAX_OCTET_LENGTH = 3;
const MAX_OCTET_VALUE = 255;

function isDecimalDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export function validateOctet(octet: string): Result {
  if (octet.length === 0 || octet.length > MAX_OCTET_LENGTH) {
    return fail("InvalidBroadcastAddress", `Broadcast address octet has an invalid length: '${octet}'`);
  }

  for (const ch of octet) {
    if (!isDecimalDigit(ch)) {
      return fail("InvalidBroadcastAddress", `Broadcast address octet contains an invalid character: '${ch}'`);
    }
  }

  if (octet.length > 1 && octet.startsWith("0")) {
    return fail("InvalidBroadcastAddress", `Broadcast address octet has a leading zero: '${octet}'`);
  }

  const value = Number.parseInt(octet, 10);
  if (value > MAX_OCTET_VALUE) {
    return fail("InvalidBroadcastAddress", `Broadcast address octet out of range (0-255): ${value}`);
  }

  return SUCCESS;
}

/**
 * Validate a broadcast address such as "192.168.0.255".
 * Octets are checked left to right as they are delimited; a fourth dot fails immediately.
 */
export function validateBroadcastAddress(text: string): Result {
  let start = 0;
  let dots = 0;

  for (let i = 0; i <= text.length; i++) {
    if (i < text.length && text.charAt(i) !== ".") continue;

    const octet = validateOctet(text.slice(start, i));
    if (!octet.ok) return octet;

    start = i + 1;
    if (i < text.length) {
      dots++;
      if (dots > DOT_COUNT) {
        return fail("InvalidBroadcastAddress", `Broadcast address has more than ${DOT_COUNT} dots`);
      }
    }
  }

  if (dots !== DOT_COUNT) {
    return fail("InvalidBroadcastAddress", `Broadcast address needs ${DOT_COUNT} dots, found ${dots}`);
  }

  return SUCCESS;
}
