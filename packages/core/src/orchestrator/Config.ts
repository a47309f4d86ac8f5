import * as fs from "fs";

/** Which checks report violations. */
export interface CheckConfig {
    importNaming: boolean;
    calls: boolean;
    functionVisibility: boolean;
}

export const ALL_CHECKS: Readonly<CheckConfig> = {
    importNaming: true,
    calls: true,
    functionVisibility: true,
};

/**
 * File access used by the analyzer. Tests substitute an in-memory host.
 */
export interface SourceHost {
    readFile(file: string): string;
    fileExists(file: string): boolean;
}

export const nodeHost: SourceHost = {
    readFile: (file) => fs.readFileSync(file, "utf-8"),
    // existsSync is false for paths that run through a regular file
    fileExists: (file) => fs.existsSync(file) && fs.statSync(file).isFile(),
};

export interface AnalyzerOptions {
    /** Report imports whose resolved file is missing. */
    checkFileExists: boolean;
    host: SourceHost;
}

export function resolveOptions(
    options: Partial<AnalyzerOptions> = {},
): AnalyzerOptions {
    return {
        checkFileExists: options.checkFileExists ?? true,
        host: options.host ?? nodeHost,
    };
}
