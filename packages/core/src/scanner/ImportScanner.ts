import * as path from "path";
import {
    DIALECT,
    externalPackageId,
    isExternalPath,
    isPrivateName,
    withDialectExtension,
} from "@starcheck/library";

import { AST } from "../parser/types";
import { CallExpression, Expression } from "../parser/expressions";
import { AssignmentStatement } from "../parser/statements";
import { AnalyzerOptions } from "../orchestrator/Config";
import { createLogger } from "../utils/log";
import { Violation } from "./Violation";
import { Walker } from "./Walker";

const log = createLogger("Imports");

/**
 * `workspace` paths are bare (`src/lib.star`) and resolve against the
 * workspace root like absolute ones.
 */
export type ImportKind = "external" | "absolute" | "relative" | "workspace";

export interface ImportBinding {
    /** Variable the import result is assigned to. */
    name: string;
    modulePath: string;
    kind: ImportKind;
    /** Absent for external packages. */
    resolvedPath?: string;
    /** `host/org/repo` of an external package. */
    packageId?: string;
    line: number;
}

export function classifyModulePath(modulePath: string): ImportKind {
    if (isExternalPath(modulePath)) return "external";
    if (modulePath.startsWith("/")) return "absolute";
    if (modulePath.startsWith("./") || modulePath.startsWith("../"))
        return "relative";
    return "workspace";
}

export function resolveModulePath(
    modulePath: string,
    kind: ImportKind,
    file: string,
    workspaceRoot: string,
): string | undefined {
    switch (kind) {
        case "external":
            return undefined;
        case "absolute":
            return path.join(workspaceRoot, modulePath.slice(1));
        case "relative":
            return path.normalize(path.join(path.dirname(file), modulePath));
        case "workspace":
            return path.join(workspaceRoot, modulePath);
    }
}

/**
 * Import bindings of one file plus the `name = other` aliases seen
 * in it.
 */
export class ImportTable {
    public readonly bindings = new Map<string, ImportBinding>();
    public readonly aliases = new Map<string, string>();

    /**
     * Follows aliases from `name` to an import binding. A cycle ends the
     * walk without a result.
     */
    public resolve(name: string): ImportBinding | undefined {
        const visited = new Set<string>();
        let current: string | undefined = name;

        while (current !== undefined) {
            if (visited.has(current)) {
                log.debug(`Alias cycle through '${current}' while resolving '${name}'`);
                return undefined;
            }
            visited.add(current);

            const binding = this.bindings.get(current);
            if (binding) return binding;
            current = this.aliases.get(current);
        }

        return undefined;
    }

    public isImport(name: string): boolean {
        return this.resolve(name) !== undefined;
    }
}

export interface ImportScanResult {
    table: ImportTable;
    violations: Violation[];
}

function isImportCall(expr: Expression): expr is CallExpression {
    return (
        expr.type === "Call" &&
        expr.callee.type === "Name" &&
        expr.callee.id === DIALECT.importPrimitive
    );
}

/**
 * Finds the import calls of a file, resolves their paths and checks that
 * module-level import variables are private.
 */
export class ImportScanner extends Walker {
    private readonly table = new ImportTable();
    private readonly violations: Violation[] = [];

    constructor(
        private readonly file: string,
        private readonly workspaceRoot: string,
        private readonly options: AnalyzerOptions,
    ) {
        super();
    }

    public scan(ast: AST): ImportScanResult {
        this.walk(ast);
        return { table: this.table, violations: this.violations };
    }

    protected visitAssignment(stmt: AssignmentStatement): void {
        super.visitAssignment(stmt);

        const line = stmt.loc.line;
        const value = stmt.value;

        for (const target of stmt.targets) {
            if (target.type === "Name") {
                this.recordAssignment(target.id, value, line);
                continue;
            }

            // a, b = import_module(...), other
            if (
                (target.type === "Tuple" || target.type === "List") &&
                (value.type === "Tuple" || value.type === "List")
            ) {
                target.elements.forEach((element, index) => {
                    const source = value.elements[index];
                    if (element.type === "Name" && source) {
                        this.recordAssignment(element.id, source, line);
                    }
                });
            }
        }
    }

    private recordAssignment(name: string, value: Expression, line: number) {
        if (isImportCall(value)) {
            const [first] = value.arguments;
            if (!first || first.type !== "StringLiteral") {
                log.debug(
                    `${this.file}:${line}: ignoring ${DIALECT.importPrimitive} call without a string path`,
                );
                return;
            }
            this.recordImport(name, first.value, line);
            return;
        }

        if (value.type === "Name") {
            this.table.aliases.set(name, value.id);
            if (this.table.isImport(value.id)) {
                this.checkNaming(name, line, true);
            }
        }
    }

    private recordImport(name: string, modulePath: string, line: number) {
        const kind = classifyModulePath(modulePath);
        const resolvedPath = resolveModulePath(
            modulePath,
            kind,
            this.file,
            this.workspaceRoot,
        );

        this.table.bindings.set(name, {
            name,
            modulePath,
            kind,
            resolvedPath,
            packageId: externalPackageId(modulePath),
            line,
        });
        this.table.aliases.delete(name);

        if (
            this.options.checkFileExists &&
            resolvedPath !== undefined &&
            !this.moduleExists(resolvedPath)
        ) {
            this.violations.push({
                file: this.file,
                line,
                message: `Imported module '${modulePath}' does not exist at resolved path '${resolvedPath}'`,
            });
        }

        this.checkNaming(name, line, false);
    }

    private moduleExists(resolvedPath: string): boolean {
        const { host } = this.options;
        return (
            host.fileExists(resolvedPath) ||
            host.fileExists(withDialectExtension(resolvedPath))
        );
    }

    // Only module-level state is governed by the convention
    private checkNaming(name: string, line: number, alias: boolean) {
        if (!this.scope.isGlobal() || isPrivateName(name)) return;

        const message = alias
            ? `Global variable '${name}' is an alias to an \`${DIALECT.importPrimitive}\` result and should be private`
            : `Global variable '${name}' contains the result of \`${DIALECT.importPrimitive}\` and should be private`;

        this.violations.push({ file: this.file, line, message });
    }
}
