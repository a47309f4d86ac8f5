import * as path from "path";
import chalk from "chalk";
import { Violation } from "@starcheck/core";

export function displayPath(file: string, cwd: string = process.cwd()): string {
    const relative = path.relative(cwd, file);
    return relative && !relative.startsWith("..") ? relative : file;
}

export function formatViolation(violation: Violation, cwd?: string): string {
    return `${displayPath(violation.file, cwd)}:${violation.line}: ${violation.message}`;
}

/** Prints every violation and the closing summary. */
export function printReport(
    results: Map<string, Violation[]>,
    fileCount: number,
): boolean {
    let found = false;
    for (const violations of results.values()) {
        for (const violation of violations) {
            console.log(formatViolation(violation));
            found = true;
        }
    }

    console.log(`\nAnalyzed ${fileCount} .star files`);
    if (found) {
        console.log(chalk.red("Found violations in the analyzed file(s)"));
    } else {
        console.log(chalk.green("No violations found"));
    }
    return found;
}
