#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { describeError } from "@starcheck/core";

import { lintCommand } from "./commands/lint";

lintCommand(yargs(hideBin(process.argv)))
    .scriptName("starcheck")
    .usage("$0 [paths..]")
    .strict()
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        console.error(chalk.red(describeError(e)));
        process.exitCode = 2;
    });
