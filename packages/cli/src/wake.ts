// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import {
    BroadcastSender,
    createLogger,
    outcomeCode,
    outcomeOf,
    type ConfigLocation,
    type Logger,
    type LoggerOptions,
} from "@lanwake/core";

import { printBanner, printConfigFailure, printSendResult, type Print } from "./report.js";
import { resolveTarget, type TargetFlags } from "./target.js";

export interface CommandDeps {
    print?: Print;
    location?: ConfigLocation;
    /** Diagnostic sink handed to the logger. */
    logSink?: LoggerOptions["write"];
    createSender?: (logger: Logger) => BroadcastSender;
}

/** Load the target, send one magic packet, print the outcome; resolves with the exit code. */
export async function runWake(flags: TargetFlags, deps: CommandDeps = {}): Promise<number> {
    const print = deps.print ?? console.log;

    const resolved = resolveTarget(flags, deps.location);
    if (!resolved.ok) {
        createLogger({ write: deps.logSink }).error(resolved.detail);
        printConfigFailure(resolved.outcome, print);
        return outcomeCode(resolved.outcome);
    }

    const { target, logLevel } = resolved.value;
    const logger = createLogger({ level: logLevel, write: deps.logSink });
    logger.debug(`Target loaded from ${resolved.value.source}`);

    printBanner(target, print);

    const sender = deps.createSender?.(logger) ?? new BroadcastSender({ logger });
    const result = await sender.sendMagicPacket(target.hardwareAddress, target.broadcastAddress, target.port);

    const outcome = outcomeOf(result);
    printSendResult(outcome, print);
    return outcomeCode(outcome);
}

export function createWakeCommand(deps: CommandDeps = {}): Command {
    return new Command("wake")
        .description("Send a Wake-on-LAN magic packet to the configured target")
        .option("-c, --config <path>", "Path to the config file")
        .option("--mac <address>", "Target MAC address (e.g. A0-36-BC-BB-EB-CC); skips the config file")
        .option("--broadcast <ip>", "Broadcast address to send to")
        .option("-p, --port <number>", "UDP port to send to")
        .action(async (options: TargetFlags) => {
            process.exitCode = await runWake(options, deps);
        });
}
