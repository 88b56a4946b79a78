// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for lanwake.
 * Reads lanwake.yaml from the working directory or ~/.lanwake/config.yaml.
 * The file shape is checked with Zod; field syntax is checked by the validators
 * while the TargetConfig is populated.
 *
 * @example
 *   target:
 *     mac_address: "00-11-22-AA-BB-CC"
 *     broadcast_ip: "192.168.0.255"
 *     port: 9
 *   log_level: INFO
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { isAbsolute, join, resolve } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { errorMessage } from "../exceptions.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { fail, ok, type FailureOutcome, type Result } from "../outcome.js";
import { TargetConfig } from "./target-config.js";

export const CONFIG_FILE_NAME = "lanwake.yaml";
export const CONFIG_ENV_VAR = "LANWAKE_CONFIG";
export const DEFAULT_BROADCAST_ADDRESS = "255.255.255.255";

// ── Zod schema ───────────────────────────────────────────────────────────────

// Scalars arrive as text (FAILSAFE schema); a key with no value arrives as null.
const TargetSchema = z.object({
  macAddress: z.string().nullish(),
  broadcastIp: z.string().nullish().default(DEFAULT_BROADCAST_ADDRESS),
  port: z.string().nullish(),
});

const ConfigSchema = z.object({
  // `target:` with nothing under it reads as null
  target: z.preprocess((section) => section ?? {}, TargetSchema),
  logLevel: z.enum(LOG_LEVELS).default("INFO"),
});

/** Which outcome a schema issue maps to, by the key it was found under. */
const KEY_OUTCOMES: Record<string, FailureOutcome> = {
  macAddress: "FailedToReadHardwareAddress",
  broadcastIp: "FailedToReadBroadcastAddress",
  port: "FailedToReadPort",
};

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

/** Convert snake_case YAML keys to camelCase for the Zod schema. */
export function toCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(toCamel);
  if (obj !== null && typeof obj === "object") {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [k.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()), toCamel(v)]),
    );
  }
  return obj;
}

// ── Locating the file ────────────────────────────────────────────────────────

export interface ConfigLocation {
  /** Explicit path (e.g. from --config); disables the search. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Home directory for the ~/.lanwake fallback; "" when it cannot be determined. */
  homeDir?: string;
}

function safeHomedir(): string {
  try {
    return homedir();
  } catch {
    return "";
  }
}

/** Candidate paths in search order. */
export function configSearchPaths(location: ConfigLocation = {}): string[] {
  const cwd = location.cwd ?? process.cwd();
  const env = location.env ?? process.env;
  const home = location.homeDir ?? safeHomedir();

  const paths: string[] = [];
  const fromEnv = env[CONFIG_ENV_VAR]?.trim();
  if (fromEnv) paths.push(resolve(cwd, fromEnv));
  paths.push(join(cwd, CONFIG_FILE_NAME), join(cwd, "config", CONFIG_FILE_NAME));
  if (home) paths.push(join(home, ".lanwake", "config.yaml"));
  return paths;
}

export function locateConfig(location: ConfigLocation = {}): Result<string> {
  const cwd = location.cwd ?? process.cwd();

  if (location.configPath !== undefined) {
    const explicit = location.configPath.trim();
    if (explicit.length === 0) {
      return fail("InvalidConfigPath", "Config path is empty");
    }
    return ok(isAbsolute(explicit) ? explicit : resolve(cwd, explicit));
  }

  const candidates = configSearchPaths(location);
  const found = candidates.find((p) => existsSync(p));
  if (found) return ok(found);

  const home = location.homeDir ?? safeHomedir();
  if (!home) {
    return fail("ConfigPathUnavailable", `No ${CONFIG_FILE_NAME} found and the home directory is unknown`);
  }
  return fail("ConfigFileNotFound", `No config file found (looked in: ${candidates.join(", ")})`);
}

// ── Loader ───────────────────────────────────────────────────────────────────

export interface LoadedConfig {
  path: string;
  target: TargetConfig;
  logLevel: LogLevel;
}

function hasErrnoCode(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/** Parse YAML text into a TargetConfig. `source` names the file in diagnostics. */
export function parseConfig(text: string, source: string): Result<Omit<LoadedConfig, "path">> {
  let raw: unknown;
  try {
    raw = yaml.load(text, { schema: yaml.FAILSAFE_SCHEMA });
  } catch (err) {
    return fail("CannotAccessConfigFile", `Failed to parse '${source}': ${errorMessage(err)}`);
  }

  const parsed = ConfigSchema.safeParse(toCamel(raw ?? {}));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path[0] === "target" ? issue.path[1] : undefined;
    const outcome = typeof key === "string" ? KEY_OUTCOMES[key] : undefined;
    const where = issue ? issue.path.join(".") || "(root)" : "(root)";
    return fail(
      outcome ?? "CannotAccessConfigFile",
      `Invalid configuration in '${source}': ${where}: ${issue?.message ?? "unknown error"}`,
    );
  }

  const target = new TargetConfig();
  const loaded = target.load(parsed.data.target);
  if (!loaded.ok) {
    return fail(loaded.outcome, `${source}: ${loaded.detail}`);
  }

  return ok({ target, logLevel: parsed.data.logLevel });
}

export function loadConfig(location: ConfigLocation = {}): Result<LoadedConfig> {
  const located = locateConfig(location);
  if (!located.ok) return located;
  const path = located.value;

  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    if (hasErrnoCode(err) && err.code === "ENOENT") {
      return fail("ConfigFileNotFound", `Config file not found: ${path}`);
    }
    return fail("CannotAccessConfigFile", `Failed to read config at '${path}': ${errorMessage(err)}`);
  }

  const parsed = parseConfig(text, path);
  if (!parsed.ok) return parsed;
  return ok({ path, ...parsed.value });
}
