// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Outcome taxonomy for lanwake.
 * Every fallible operation returns a Result; the outcome's numeric code is the
 * process exit code reported by the CLI.
 */

export const OUTCOME_CODES = {
  Success: 0,

  // Locating the config file
  ConfigPathUnavailable: 1,
  InvalidConfigPath: 2,

  // Reading and validating the config file
  ConfigFileNotFound: 3,
  CannotAccessConfigFile: 4,
  FailedToReadHardwareAddress: 5,
  InvalidHardwareAddress: 6,
  FailedToReadBroadcastAddress: 7,
  InvalidBroadcastAddress: 8,
  FailedToReadPort: 9,
  InvalidPort: 10,

  // Sending the magic packet
  NetworkStackInitFailed: 11,
  SocketCreationFailed: 12,
  BroadcastSetupFailed: 13,
  PacketSendFailed: 14,

  UnexpectedFailure: 15,
} as const;

export type Outcome = keyof typeof OUTCOME_CODES;
export type FailureOutcome = Exclude<Outcome, "Success">;

const DESCRIPTIONS: Record<Outcome, string> = {
  Success: "Success",
  ConfigPathUnavailable: "Could not determine where to look for the config file",
  InvalidConfigPath: "Invalid config file path",
  ConfigFileNotFound: "Config file not found",
  CannotAccessConfigFile: "Config file could not be read",
  FailedToReadHardwareAddress: "Could not read the MAC address from the config file",
  InvalidHardwareAddress: "Invalid MAC address",
  FailedToReadBroadcastAddress: "Could not read the broadcast address from the config file",
  InvalidBroadcastAddress: "Invalid broadcast address",
  FailedToReadPort: "Could not read the port from the config file",
  InvalidPort: "Invalid port number",
  NetworkStackInitFailed: "Network stack initialization failed",
  SocketCreationFailed: "Socket creation failed",
  BroadcastSetupFailed: "Broadcast setup failed",
  PacketSendFailed: "Packet send failed",
  UnexpectedFailure: "Unexpected failure",
};

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  outcome: FailureOutcome;
  /** One-line diagnostic naming the failing field or stage. */
  detail: string;
}

export type Result<T = void> = Success<T> | Failure;

export const SUCCESS: Success<void> = { ok: true, value: undefined };

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(outcome: FailureOutcome, detail: string): Failure {
  return { ok: false, outcome, detail };
}

/** Outcome name of a result: "Success" or the failure kind. */
export function outcomeOf(result: Result<unknown>): Outcome {
  return result.ok ? "Success" : result.outcome;
}

export function outcomeCode(outcome: Outcome): number {
  return OUTCOME_CODES[outcome];
}

export function describeOutcome(outcome: Outcome): string {
  return DESCRIPTIONS[outcome];
}

/** Failures caused by the config file not being readable at all (as opposed to bad values). */
export function isReadFailure(outcome: Outcome): boolean {
  return (
    outcome === "FailedToReadHardwareAddress" ||
    outcome === "FailedToReadBroadcastAddress" ||
    outcome === "FailedToReadPort"
  );
}
