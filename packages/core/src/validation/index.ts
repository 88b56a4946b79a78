// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { SUCCESS, type Result } from "../outcome.js";
import { validateBroadcastAddress } from "./broadcast-address.js";
import { validateHardwareAddress } from "./hardware-address.js";
import { validatePort } from "./port.js";

export * from "./hardware-address.js";
export * from "./broadcast-address.js";
export * from "./port.js";

export interface TargetFields {
  hardwareAddress: string;
  broadcastAddress: string;
  port: number;
}

/** Run all three field checks in order and return the first failure. */
export function validateTarget(fields: TargetFields): Result {
  const checks = [
    () => validateHardwareAddress(fields.hardwareAddress),
    () => validateBroadcastAddress(fields.broadcastAddress),
    () => validatePort(fields.port),
  ];

  for (const check of checks) {
    const result = check();
    if (!result.ok) return result;
  }
  return SUCCESS;
}
