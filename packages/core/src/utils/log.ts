import chalk from "chalk";

// silent < warn < info < debug
export type LogLevel = "silent" | "warn" | "info" | "debug";

const LEVEL_ORDER: Record<LogLevel, number> = {
    silent: 0,
    warn: 1,
    info: 2,
    debug: 3,
};

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
}

let currentLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function setVerbose(verbose: boolean): void {
    currentLevel = verbose ? "debug" : "warn";
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[currentLevel] >= LEVEL_ORDER[level];
}

/**
 * Creates a logger whose lines are prefixed with `[scope]`.
 *
 * Everything goes to stderr so that reports written to stdout stay clean.
 */
export function createLogger(scope: string): Logger {
    const prefix = `[${scope}]`;

    return {
        debug(message) {
            if (enabled("debug")) {
                console.error(chalk.gray(`${prefix} ${message}`));
            }
        },
        info(message) {
            if (enabled("info")) {
                console.error(`${chalk.magenta(prefix)} ${message}`);
            }
        },
        warn(message) {
            if (enabled("warn")) {
                console.error(chalk.yellow(`${prefix} ${message}`));
            }
        },
    };
}
