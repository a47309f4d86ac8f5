import * as path from "path";
import chalk from "chalk";
import type { Argv } from "yargs";
import {
    ALL_CHECKS,
    CheckConfig,
    analyzeFiles,
    createLogger,
    setVerbose,
} from "@starcheck/core";

import {
    CONFIG_FILE_NAME,
    ConfigError,
    FileConfig,
    loadConfig,
} from "../config";
import { collectSourceFiles } from "../files";
import { printReport } from "../report";
import { findWorkspaceRoot } from "../workspace";

const log = createLogger("CLI");

export interface LintOptions {
    paths: string[];
    checkedCalls?: boolean;
    functionVisibility?: boolean;
    importNaming?: boolean;
    all?: boolean;
    checkFileExists?: boolean;
    verbose?: boolean;
    config?: string;
}

/** Flags win over the configuration file; `--all` enables every check. */
export function resolveChecks(
    options: LintOptions,
    fileConfig: FileConfig,
): CheckConfig {
    if (options.all) return { ...ALL_CHECKS };

    return {
        importNaming:
            options.importNaming ?? fileConfig.checks.importNaming ?? false,
        calls: options.checkedCalls ?? fileConfig.checks.calls ?? false,
        functionVisibility:
            options.functionVisibility ??
            fileConfig.checks.functionVisibility ??
            false,
    };
}

/**
 * Analyzes every source file under `options.paths` and prints the report.
 * Resolves to the process exit code: 0 when clean, 1 with violations,
 * 2 for a bad configuration.
 */
export async function runLint(options: LintOptions): Promise<number> {
    const targets = options.paths.length > 0 ? options.paths : ["."];
    const workspaceRoot = findWorkspaceRoot(targets[0]);

    let fileConfig: FileConfig;
    try {
        fileConfig = options.config
            ? await loadConfig(path.resolve(options.config), true)
            : await loadConfig(path.join(workspaceRoot, CONFIG_FILE_NAME), false);
    } catch (e) {
        if (e instanceof ConfigError) {
            console.error(chalk.red(e.message));
            return 2;
        }
        throw e;
    }

    setVerbose(options.verbose ?? fileConfig.verbose ?? false);

    const checks = resolveChecks(options, fileConfig);
    log.info(`Workspace root: ${workspaceRoot}`);
    log.debug(
        `Checks: ${Object.entries(checks)
            .filter(([, enabled]) => enabled)
            .map(([name]) => name)
            .join(", ") || "none"}`,
    );

    const files = collectSourceFiles(targets);
    if (files.length === 0) {
        console.log(chalk.yellow("No .star files found"));
        return 0;
    }

    const results = analyzeFiles(files, checks, workspaceRoot, {
        checkFileExists:
            options.checkFileExists ?? fileConfig.checkFileExists ?? true,
    });

    return printReport(results, files.length) ? 1 : 0;
}

export function lintCommand(cli: Argv): Argv {
    return cli.command(
        "$0 [paths..]",
        "Check .star files for import, call and visibility problems",
        (yargs) =>
            yargs
                .positional("paths", {
                    describe: "Files or directories to analyze",
                    type: "string",
                    array: true,
                    default: ["."],
                })
                .option("checked-calls", {
                    describe: "Check calls against function signatures",
                    type: "boolean",
                })
                .option("function-visibility", {
                    describe: "Check documentation and visibility of functions",
                    type: "boolean",
                })
                .option("import-naming", {
                    describe: "Check that imported modules are held in private globals",
                    type: "boolean",
                })
                .option("all", {
                    describe: "Enable every check",
                    type: "boolean",
                })
                .option("check-file-exists", {
                    describe: "Report imports of files that do not exist",
                    type: "boolean",
                })
                .option("config", {
                    describe: `Configuration file (default: ${CONFIG_FILE_NAME} in the workspace root)`,
                    type: "string",
                })
                .option("verbose", {
                    alias: "v",
                    describe: "Log analysis progress",
                    type: "boolean",
                }),
        async (argv) => {
            process.exitCode = await runLint({
                paths: argv.paths,
                checkedCalls: argv.checkedCalls,
                functionVisibility: argv.functionVisibility,
                importNaming: argv.importNaming,
                all: argv.all,
                checkFileExists: argv.checkFileExists,
                verbose: argv.verbose,
                config: argv.config,
            });
        },
    );
}
