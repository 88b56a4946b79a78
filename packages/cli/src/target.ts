// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// Resolves the wake target from the config file and/or command-line flags.
// --mac alone is enough to skip the config file; --broadcast and --port override either source.

import {
    DEFAULT_BROADCAST_ADDRESS,
    DEFAULT_WOL_PORT,
    loadConfig,
    ok,
    TargetConfig,
    type ConfigLocation,
    type LogLevel,
    type Result,
} from "@lanwake/core";

export interface TargetFlags {
    config?: string;
    mac?: string;
    broadcast?: string;
    port?: string;
}

export interface ResolvedTarget {
    target: TargetConfig;
    /** Config file path, or "command line". */
    source: string;
    logLevel?: LogLevel;
}

export function resolveTarget(flags: TargetFlags, location: ConfigLocation = {}): Result<ResolvedTarget> {
    if (flags.mac !== undefined) {
        const target = new TargetConfig();
        const loaded = target.load({
            macAddress: flags.mac,
            broadcastIp: flags.broadcast ?? DEFAULT_BROADCAST_ADDRESS,
            port: flags.port ?? DEFAULT_WOL_PORT,
        });
        if (!loaded.ok) return loaded;
        return ok({ target, source: "command line" });
    }

    const config = loadConfig({ ...location, configPath: flags.config ?? location.configPath });
    if (!config.ok) return config;

    if (flags.broadcast === undefined && flags.port === undefined) {
        return ok({ target: config.value.target, source: config.value.path, logLevel: config.value.logLevel });
    }

    const fromFile = config.value.target;
    const target = new TargetConfig();
    const loaded = target.load({
        macAddress: fromFile.hardwareAddress,
        broadcastIp: flags.broadcast ?? fromFile.broadcastAddress,
        port: flags.port ?? fromFile.port,
    });
    if (!loaded.ok) return loaded;
    return ok({ target, source: config.value.path, logLevel: config.value.logLevel });
}
