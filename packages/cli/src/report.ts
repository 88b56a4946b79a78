// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import chalk from "chalk";
import { describeOutcome, isReadFailure, type Outcome, type TargetConfig } from "@lanwake/core";

export type Print = (line: string) => void;

export const REMEDIATION_CHECKLIST = [
    "Wake-on-LAN is enabled in the target's BIOS/UEFI",
    "The network adapter's power management allows it to wake the machine",
    "The MAC address and broadcast address are correct",
    "Firewall and router settings let the broadcast through",
] as const;

export function printBanner(target: TargetConfig, print: Print): void {
    print(chalk.bold.cyan("=== Wake-on-LAN ==="));
    print(`Target MAC:     ${chalk.white(target.hardwareAddress)}`);
    print(`Broadcast IP:   ${chalk.white(target.broadcastAddress)}`);
    print(`Port:           ${chalk.white(String(target.port))}`);
    print(chalk.dim("─".repeat(32)));
}

export function printSendResult(outcome: Outcome, print: Print): void {
    print(`Result: ${describeOutcome(outcome)}`);

    if (outcome !== "Success") {
        print(chalk.red("The magic packet could not be sent."));
        return;
    }

    print(chalk.green("Magic packet sent."));
    print("If the target does not wake up, check that:");
    REMEDIATION_CHECKLIST.forEach((item, i) => print(`  ${i + 1}. ${item}`));
}

/** Failure line for an outcome raised while loading the config. */
export function printConfigFailure(outcome: Outcome, print: Print): void {
    print(chalk.red(`Could not load the configuration: ${describeOutcome(outcome)}`));
    if (isReadFailure(outcome)) {
        print(chalk.yellow("  The config file must be UTF-8 encoded YAML."));
    }
}
