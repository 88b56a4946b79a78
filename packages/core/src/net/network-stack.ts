// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/net/network-stack.ts
// Reference-counted network-stack lifetime.
//
//   acquire: 0 → 1  calls transport.startup()
//   release: 1 → 0  calls transport.cleanup()
//
// Both transitions run synchronously, so no other caller can observe the
// count between the check and the update on Node's single event loop.

import { fail, ok, SUCCESS, type Result } from "../outcome.js";
import { errorMessage } from "../exceptions.js";
import { silentLogger, type Logger } from "../logger.js";
import { NodeDatagramTransport, type DatagramTransport } from "./transport.js";

export class NetworkStack {
  private count = 0;

  constructor(
    readonly transport: DatagramTransport,
    private readonly logger: Logger = silentLogger,
  ) {}

  get refCount(): number {
    return this.count;
  }

  /** @internal Used by NetworkStackGuard only. */
  retain(): Result {
    if (this.count === 0) {
      try {
        this.transport.startup();
      } catch (err) {
        return fail("NetworkStackInitFailed", `Network stack initialization failed: ${errorMessage(err)}`);
      }
    }
    this.count++;
    return SUCCESS;
  }

  /** @internal Used by NetworkStackGuard only. */
  releaseOne(): void {
    if (this.count === 0) return;
    this.count--;
    if (this.count === 0) {
      try {
        this.transport.cleanup();
      } catch (err) {
        // Nothing can be done about a failed teardown
        this.logger.warn(`Network stack cleanup failed: ${errorMessage(err)}`);
      }
    }
  }
}

/** Holds one reference on a NetworkStack until release(). */
export class NetworkStackGuard {
  private released = false;

  private constructor(private readonly stack: NetworkStack) {}

  static acquire(stack: NetworkStack): Result<NetworkStackGuard> {
    const retained = stack.retain();
    if (!retained.ok) return retained;
    return ok(new NetworkStackGuard(stack));
  }

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.stack.releaseOne();
  }
}

/** Process-wide stack for the node:dgram transport. */
export const defaultNetworkStack = new NetworkStack(new NodeDatagramTransport());
