// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import { VERSION } from "@lanwake/core";

import { createCheckCommand } from "./check.js";
import { createPacketCommand } from "./packet.js";
import { createWakeCommand, type CommandDeps } from "./wake.js";

export function createProgram(deps: CommandDeps = {}): Command {
    const program = new Command();

    program
        .name("lanwake")
        .description("Wake a machine on the local network with a Wake-on-LAN magic packet")
        .version(VERSION);

    program.addCommand(createWakeCommand(deps), { isDefault: true });
    program.addCommand(createCheckCommand(deps));
    program.addCommand(createPacketCommand(deps));

    return program;
}
