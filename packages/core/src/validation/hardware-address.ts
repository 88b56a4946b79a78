// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/validation/hardware-address.ts
// MAC address syntax: six 2-hexdigit groups joined by "-" (e.g. "A0-36-BC-BB-EB-CC").

import { fail, SUCCESS, type Result } from "../outcome.js";

export const HARDWARE_ADDRESS_SEPARATOR = "-";
/** Six groups of two hex digits plus five separators. */
export const HARDWARE_ADDRESS_TEXT_LENGTH = 17;
export const HARDWARE_ADDRESS_MAX_LENGTH = 18;

const SEPARATOR_INDICES: ReadonlySet<number> = new Set([2, 5, 8, 11, 14]);

export function isHexDigit(ch: string): boolean {
  return (ch >= "0" && ch <= "9") || (ch >= "A" && ch <= "F") || (ch >= "a" && ch <= "f");
}

/**
 * Validate a MAC address string.
 * Length is checked before characters; the first offending character ends the check.
 */
export function validateHardwareAddress(text: string): Result {
  if (text.length === 0 || text.length > HARDWARE_ADDRESS_MAX_LENGTH) {
    return fail("InvalidHardwareAddress", `MAC address has an invalid length (${text.length})`);
  }

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (SEPARATOR_INDICES.has(i)) {
      if (ch !== HARDWARE_ADDRESS_SEPARATOR) {
        return fail(
          "InvalidHardwareAddress",
          `MAC address separator at position ${i} must be '${HARDWARE_ADDRESS_SEPARATOR}', got '${ch}'`,
        );
      }
    } else if (!isHexDigit(ch)) {
      return fail("InvalidHardwareAddress", `MAC address contains an invalid character: '${ch}'`);
    }
  }

  // Every character so far is well placed, so only a truncated or overlong tail remains
  if (text.length !== HARDWARE_ADDRESS_TEXT_LENGTH) {
    return fail(
      "InvalidHardwareAddress",
      `MAC address must have six groups (expected ${HARDWARE_ADDRESS_TEXT_LENGTH} characters, got ${text.length})`,
    );
  }

  return SUCCESS;
}
