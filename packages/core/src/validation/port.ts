// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { fail, ok, SUCCESS, type Result } from "../outcome.js";

export const MIN_PORT = 1;
export const MAX_PORT = 65_535;
/** Standard Wake-on-LAN discard port. */
export const DEFAULT_WOL_PORT = 9;

export function validatePort(port: number): Result {
  if (!Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT) {
    return fail("InvalidPort", `Port must be an integer between ${MIN_PORT} and ${MAX_PORT}, got ${port}`);
  }
  return SUCCESS;
}

/**
 * Parse a port from text: ASCII digits only, no sign, whitespace or trailing characters.
 * Overflow and malformed text are both InvalidPort; only the diagnostic differs.
 */
export function parsePort(text: string): Result<number> {
  if (!/^\d+$/.test(text)) {
    return fail("InvalidPort", `Port is not a number: '${text}'`);
  }

  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    return fail("InvalidPort", `Port is out of range: '${text}'`);
  }

  const range = validatePort(value);
  if (!range.ok) return range;

  return ok(value);
}
