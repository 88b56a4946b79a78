// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { fail, SUCCESS, type Result } from "../outcome.js";
import { parsePort, validateTarget } from "../validation/index.js";

/** Raw values read from the `target` section, before validation. */
export interface RawTarget {
  macAddress?: string | null;
  broadcastIp?: string | null;
  port?: string | number | null;
}

/** The value as text; undefined when the key is absent, null or blank. */
function textOf(value: string | number | null | undefined): string | undefined {
  if (value === undefined || value === null) return undefined;
  const text = String(value);
  return text.trim().length > 0 ? text : undefined;
}

/**
 * The validated wake target.
 * Starts empty; load() either fills all three fields or leaves them all empty.
 */
export class TargetConfig {
  private _hardwareAddress = "";
  private _broadcastAddress = "";
  private _port = 0;

  get hardwareAddress(): string {
    return this._hardwareAddress;
  }

  get broadcastAddress(): string {
    return this._broadcastAddress;
  }

  get port(): number {
    return this._port;
  }

  get isLoaded(): boolean {
    return this._port !== 0;
  }

  load(raw: RawTarget): Result {
    this.reset();

    const macAddress = textOf(raw.macAddress);
    if (macAddress === undefined) {
      return fail("FailedToReadHardwareAddress", "mac_address is missing from the target section");
    }
    const broadcastIp = textOf(raw.broadcastIp);
    if (broadcastIp === undefined) {
      return fail("FailedToReadBroadcastAddress", "broadcast_ip is missing from the target section");
    }
    const portText = textOf(raw.port);
    if (portText === undefined) {
      return fail("FailedToReadPort", "port is missing from the target section");
    }

    const port = parsePort(portText);
    if (!port.ok) return port;

    const fields = {
      hardwareAddress: macAddress,
      broadcastAddress: broadcastIp,
      port: port.value,
    };
    const valid = validateTarget(fields);
    if (!valid.ok) return valid;

    this._hardwareAddress = fields.hardwareAddress;
    this._broadcastAddress = fields.broadcastAddress;
    this._port = fields.port;
    return SUCCESS;
  }

  private reset(): void {
    this._hardwareAddress = "";
    this._broadcastAddress = "";
    this._port = 0;
  }
}
