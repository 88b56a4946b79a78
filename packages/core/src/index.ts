// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * lanwake public API.
 * Import from this module when using lanwake as a library.
 */

export { VERSION } from "./version.js";
export {
  OUTCOME_CODES,
  SUCCESS,
  ok,
  fail,
  outcomeOf,
  outcomeCode,
  describeOutcome,
  isReadFailure,
} from "./outcome.js";
export type { Outcome, FailureOutcome, Result, Success, Failure } from "./outcome.js";
export { LanWakeError, ContractViolationError } from "./exceptions.js";
export {
  validateHardwareAddress,
  validateBroadcastAddress,
  validateOctet,
  validatePort,
  parsePort,
  validateTarget,
  MIN_PORT,
  MAX_PORT,
  DEFAULT_WOL_PORT,
} from "./validation/index.js";
export type { TargetFields } from "./validation/index.js";
export {
  parseHardwareAddress,
  buildMagicPacket,
  formatPacket,
  MAGIC_PACKET_LENGTH,
} from "./packet/magic-packet.js";
export type { HardwareAddress } from "./packet/magic-packet.js";
export { NetworkStack, NetworkStackGuard, defaultNetworkStack } from "./net/network-stack.js";
export { BroadcastSocket } from "./net/broadcast-socket.js";
export { resolveDestination } from "./net/destination.js";
export { NodeDatagramTransport } from "./net/transport.js";
export type { DatagramTransport, DatagramHandle, Destination } from "./net/transport.js";
export { BroadcastSender } from "./sender/sender.js";
export type { SendReport, BroadcastSenderOptions } from "./sender/sender.js";
export {
  loadConfig,
  parseConfig,
  locateConfig,
  configSearchPaths,
  CONFIG_FILE_NAME,
  CONFIG_ENV_VAR,
  DEFAULT_BROADCAST_ADDRESS,
} from "./config/config.js";
export type { LoadedConfig, ConfigLocation } from "./config/config.js";
export { TargetConfig } from "./config/target-config.js";
export type { RawTarget } from "./config/target-config.js";
export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from "./logger.js";
export type { Logger, LogLevel, LoggerOptions } from "./logger.js";
