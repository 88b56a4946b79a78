// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { createLogger, outcomeCode } from "@lanwake/core";

import { printBanner, printConfigFailure } from "./report.js";
import { resolveTarget, type TargetFlags } from "./target.js";
import type { CommandDeps } from "./wake.js";

/** Validate the configuration without sending anything. */
export function runCheck(flags: TargetFlags, deps: CommandDeps = {}): number {
    const print = deps.print ?? console.log;

    const resolved = resolveTarget(flags, deps.location);
    if (!resolved.ok) {
        createLogger({ write: deps.logSink }).error(resolved.detail);
        printConfigFailure(resolved.outcome, print);
        return outcomeCode(resolved.outcome);
    }

    printBanner(resolved.value.target, print);
    print(chalk.green(`Configuration OK (${resolved.value.source})`));
    return outcomeCode("Success");
}

export function createCheckCommand(deps: CommandDeps = {}): Command {
    return new Command("check")
        .description("Validate the config file without sending a packet")
        .option("-c, --config <path>", "Path to the config file")
        .action((options: Pick<TargetFlags, "config">) => {
            process.exitCode = runCheck(options, deps);
        });
}
