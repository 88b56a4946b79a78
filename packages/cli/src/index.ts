#!/usr/bin/env node

import chalk from "chalk";
import { outcomeCode } from "@lanwake/core";

import { createProgram } from "./program.js";

createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
        console.error(chalk.red(`\nFatal error: ${err instanceof Error ? err.message : String(err)}`));
        process.exit(outcomeCode("UnexpectedFailure"));
    });
