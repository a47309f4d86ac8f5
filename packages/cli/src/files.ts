import * as fs from "fs";
import * as path from "path";
import { DIALECT } from "@starcheck/library";
import { createLogger } from "@starcheck/core";

const log = createLogger("Files");

const SKIPPED_DIRECTORIES = new Set(["node_modules"]);

function walkDirectory(dir: string, into: string[]) {
    const entries = fs
        .readdirSync(dir, { withFileTypes: true })
        .sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            if (entry.name.startsWith(".") || SKIPPED_DIRECTORIES.has(entry.name))
                continue;
            walkDirectory(full, into);
        } else if (entry.isFile() && entry.name.endsWith(DIALECT.extension)) {
            into.push(full);
        }
    }
}

/**
 * Source files under `target`. A file path is returned as given, whatever
 * its extension.
 */
export function findSourceFiles(target: string): string[] {
    const resolved = path.resolve(target);
    const stat = fs.statSync(resolved, { throwIfNoEntry: false });

    if (!stat) {
        log.warn(`Path not found: ${target}`);
        return [];
    }
    if (stat.isFile()) return [resolved];

    const files: string[] = [];
    walkDirectory(resolved, files);
    return files;
}

/** Source files under every target, first occurrence first. */
export function collectSourceFiles(targets: string[]): string[] {
    const seen = new Set<string>();
    for (const target of targets) {
        for (const file of findSourceFiles(target)) seen.add(file);
    }
    return [...seen];
}
