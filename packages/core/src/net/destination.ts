// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { isIPv4 } from "net";

import { fail, ok, type Result } from "../outcome.js";
import type { Destination } from "./transport.js";

/** Convert "a.b.c.d" + port to a Destination; text that is not an IPv4 address is BroadcastSetupFailed. */
export function resolveDestination(address: string, port: number): Result<Destination> {
  if (!isIPv4(address)) {
    return fail("BroadcastSetupFailed", `Could not convert broadcast address to IPv4: '${address}'`);
  }

  const [a, b, c, d] = address.split(".").map((octet) => Number.parseInt(octet, 10));
  if (a === undefined || b === undefined || c === undefined || d === undefined) {
    return fail("BroadcastSetupFailed", `Could not convert broadcast address to IPv4: '${address}'`);
  }

  return ok({ address, octets: [a, b, c, d], port });
}
