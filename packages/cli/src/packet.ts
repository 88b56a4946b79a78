// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import {
    buildMagicPacket,
    createLogger,
    formatPacket,
    outcomeCode,
    parseHardwareAddress,
    validateHardwareAddress,
} from "@lanwake/core";

import type { CommandDeps } from "./wake.js";

/** Print the magic packet for a MAC address as a hex dump. */
export function runPacket(mac: string, deps: CommandDeps = {}): number {
    const print = deps.print ?? console.log;

    const valid = validateHardwareAddress(mac);
    if (!valid.ok) {
        createLogger({ write: deps.logSink }).error(valid.detail);
        return outcomeCode(valid.outcome);
    }

    const packet = buildMagicPacket(parseHardwareAddress(mac));
    print(chalk.bold(`Magic packet for ${mac} (${packet.length} bytes)`));
    print(formatPacket(packet));
    return outcomeCode("Success");
}

export function createPacketCommand(deps: CommandDeps = {}): Command {
    return new Command("packet")
        .description("Print the magic packet for a MAC address without sending it")
        .argument("<mac>", "MAC address, e.g. A0-36-BC-BB-EB-CC")
        .action((mac: string) => {
            process.exitCode = runPacket(mac, deps);
        });
}
