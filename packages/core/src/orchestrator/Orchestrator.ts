import * as path from "path";
import { DIALECT } from "@starcheck/library";

import { Lexer } from "../lexer/Lexer";
import { Parser } from "../parser/Parser";
import { AST } from "../parser/types";
import { FunctionScanner } from "../scanner/FunctionScanner";
import { ImportScanner } from "../scanner/ImportScanner";
import { FunctionSummary } from "../scanner/signature";
import { Violation } from "../scanner/Violation";
import { judgeVisibility } from "../scanner/visibility";
import { StarcheckError, describeError } from "../utils/Error";
import { createLogger } from "../utils/log";
import {
    AnalyzerOptions,
    CheckConfig,
    SourceHost,
    resolveOptions,
} from "./Config";
import { SharedState, createSharedState } from "./SharedState";

const log = createLogger("Orchestrator");

// Pass 1 only collects; its call violations are dropped
const COLLECT_ONLY: CheckConfig = {
    importNaming: false,
    calls: true,
    functionVisibility: false,
};

interface FileScan {
    importViolations: Violation[];
    callViolations: Violation[];
    functions: FunctionSummary[];
}

export function parseSource(source: string): AST {
    const tokens = new Lexer(source).tokenize();
    return new Parser(tokens, source).parse();
}

function parseFile(file: string, host: SourceHost): AST {
    return parseSource(host.readFile(file));
}

/**
 * Walks one file with both scanners, writing its imports, signatures and
 * references into `state`.
 */
function scanFile(
    file: string,
    checks: CheckConfig,
    state: SharedState,
    workspaceRoot: string,
    options: AnalyzerOptions,
): FileScan {
    const ast = parseFile(file, options.host);

    const imports = new ImportScanner(file, workspaceRoot, options).scan(ast);
    state.imports.set(file, imports.table);

    const functions = new FunctionScanner(file, state, checks.calls).scan(ast);

    return {
        importViolations: checks.importNaming ? imports.violations : [],
        callViolations: functions.violations,
        functions: functions.functions,
    };
}

function failure(file: string, error: unknown): Violation {
    log.warn(`${file}: ${describeError(error)}`);
    if (error instanceof StarcheckError) log.debug(error.message);
    return {
        file,
        line: 0,
        message: `Error analyzing file ${file}: ${describeError(error)}`,
    };
}

/**
 * Analyzes a single file against `state` as it stands and reports
 * visibility from the references known so far.
 *
 * Any error is returned as one violation at line 0.
 */
export function analyzeFile(
    file: string,
    checks: CheckConfig,
    state: SharedState,
    workspaceRoot: string,
    options: Partial<AnalyzerOptions> = {},
): Violation[] {
    const resolved = resolveOptions(options);

    try {
        const scan = scanFile(file, checks, state, workspaceRoot, resolved);
        const violations = [...scan.importViolations, ...scan.callViolations];
        if (checks.functionVisibility) {
            violations.push(
                ...judgeVisibility(file, scan.functions, state.references),
            );
        }
        return violations;
    } catch (e) {
        return [failure(file, e)];
    }
}

/**
 * Every name a file may be imported by: absolute path, path relative to
 * the workspace root (with and without a leading `/`), base name, and
 * the relative path from each other file (with and without `./`).
 * The first file to claim a name keeps it.
 */
export function buildModuleMap(
    files: string[],
    workspaceRoot: string,
): Map<string, string> {
    const moduleFiles = new Map<string, string>();
    const claim = (modulePath: string, file: string) => {
        if (!moduleFiles.has(modulePath)) moduleFiles.set(modulePath, file);
    };

    const modules = files.filter((file) => file.endsWith(DIALECT.extension));

    for (const file of modules) {
        const relative = path.relative(workspaceRoot, file);
        claim(file, file);
        claim(relative, file);
        claim("/" + relative, file);
        claim(path.basename(file), file);
    }

    for (const from of modules) {
        for (const to of modules) {
            if (from === to) continue;
            const relative = path.relative(path.dirname(from), to);
            claim(relative, to);
            if (!relative.startsWith("..")) claim("./" + relative, to);
        }
    }

    return moduleFiles;
}

/**
 * Two-pass analysis of `files`. Pass 1 fills the shared state; pass 2
 * re-walks every file against it and reports. Visibility is judged after
 * all pass-2 walks, so the order of `files` does not matter.
 *
 * Files without violations are left out of the result.
 */
export function analyzeFiles(
    files: string[],
    checks: CheckConfig,
    workspaceRoot: string,
    options: Partial<AnalyzerOptions> = {},
): Map<string, Violation[]> {
    const resolved = resolveOptions(options);
    const root = path.resolve(workspaceRoot);
    const unique = [...new Set(files.map((file) => path.resolve(file)))];

    const state = createSharedState();
    for (const [modulePath, file] of buildModuleMap(unique, root)) {
        state.moduleFiles.set(modulePath, file);
    }

    log.debug(`Pass 1: collecting from ${unique.length} files`);
    for (const file of unique) {
        try {
            scanFile(file, COLLECT_ONLY, state, root, resolved);
        } catch (e) {
            // Reported again, with the file, in pass 2
            log.debug(`Pass 1 skipped ${file}: ${describeError(e)}`);
        }
    }

    log.debug(
        `Pass 2: checking with ${state.references.size} cross-file references`,
    );
    const scans = new Map<string, FileScan | Violation>();
    for (const file of unique) {
        try {
            scans.set(file, scanFile(file, checks, state, root, resolved));
        } catch (e) {
            scans.set(file, failure(file, e));
        }
    }

    const results = new Map<string, Violation[]>();
    for (const [file, scan] of scans) {
        let violations: Violation[];
        if ("message" in scan) {
            violations = [scan];
        } else {
            violations = [...scan.importViolations, ...scan.callViolations];
            if (checks.functionVisibility) {
                violations.push(
                    ...judgeVisibility(file, scan.functions, state.references),
                );
            }
        }

        log.debug(`${file}: ${violations.length} violations`);
        if (violations.length > 0) results.set(file, violations);
    }

    return results;
}
