import chalk from "chalk";

export interface ErrorLocation {
    line: number;
    col: number;
    len?: number;
    endLine?: number;
    endCol?: number;
}

export class StarcheckError extends Error {
    public rawMessage: string;
    public loc: ErrorLocation;
    public source?: string;

    constructor(message: string, loc: ErrorLocation, source?: string) {
        super(formatCodeFrame(message, loc, source));
        this.name = "StarcheckError";
        this.rawMessage = message;
        this.loc = loc;
        this.source = source;
    }

    /** One-line description, without the code frame. */
    public describe(): string {
        return `${this.rawMessage} (line ${this.loc.line}, column ${this.loc.col})`;
    }
}

/**
 * Renders a compiler-style frame pointing at `loc` inside `source`.
 *
 * Without the source text only the message and position are rendered.
 */
export function formatCodeFrame(
    message: string,
    loc: ErrorLocation,
    source?: string,
): string {
    const lineNumStr = String(loc.line);
    const padding = " ".repeat(lineNumStr.length);

    const errorHeader = `${chalk.red.bold("Error:")} ${chalk.bold(message)}`;
    const locationLine = `${chalk.blue(padding)} ${chalk.blue("-->")} line ${loc.line}:${loc.col}`;

    if (!source) {
        return "\n" + [errorHeader, locationLine].join("\n");
    }

    // loc.line is 1-indexed
    const lineContent = source.split("\n")[loc.line - 1] ?? "";
    const pipeLine = `${chalk.blue(padding)} ${chalk.blue("|")}`;
    const codeLine = `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent}`;

    const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
    const underlineLen = Math.max(1, loc.len || 1);
    const pointer = chalk.red.bold("^".repeat(underlineLen));
    const pointerLine = `${chalk.blue(padding)} ${chalk.blue("|")} ${pointerSpace}${pointer}`;

    const output = [
        errorHeader,
        locationLine,
        pipeLine,
        codeLine,
        pointerLine,
        pipeLine,
    ];

    return "\n" + output.join("\n");
}

/**
 * Short human-readable reason for any thrown value.
 */
export function describeError(e: unknown): string {
    if (e instanceof StarcheckError) return e.describe();
    if (e instanceof Error) return e.message;
    return String(e);
}
