// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Typed error hierarchy for lanwake.
 * Recoverable failures travel as Result values (see outcome.ts); these errors
 * are only thrown for caller bugs.
 */

export class LanWakeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LanWakeError";
  }
}

export class ContractViolationError extends LanWakeError {
  constructor(message: string) {
    super(`Contract violation: ${message}`);
    this.name = "ContractViolationError";
  }
}

export function assertContract(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ContractViolationError(message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
