import * as path from "path";
import {
    isBuiltinFunction,
    isBuiltinModule,
    withDialectExtension,
} from "@starcheck/library";

import { AST } from "../parser/types";
import { AttributeExpression, CallExpression } from "../parser/expressions";
import { DefStatement } from "../parser/statements";
import { SharedState } from "../orchestrator/SharedState";
import { createLogger } from "../utils/log";
import { checkCall } from "./callCompat";
import { ImportBinding, ImportTable } from "./ImportScanner";
import {
    FunctionSignature,
    FunctionSummary,
    FunctionTable,
    extractSignature,
    summarize,
} from "./signature";
import { Violation } from "./Violation";
import { Walker } from "./Walker";

const log = createLogger("Functions");

export interface FunctionScanResult {
    signatures: FunctionTable;
    /**
     * Every function the file defines, nested ones included, in order of
     * first definition. A redefinition replaces the earlier summary.
     */
    functions: FunctionSummary[];
    violations: Violation[];
}

/**
 * Collects the signatures of a file, checks its calls against local and
 * imported signatures and records references into other files.
 *
 * Signatures and references are written to the shared state whether or
 * not call violations are reported.
 */
export class FunctionScanner extends Walker {
    private readonly signatures: FunctionTable = new Map();
    private readonly functions = new Map<string, FunctionSummary>();
    private readonly violations: Violation[] = [];
    private readonly imports: ImportTable;

    constructor(
        private readonly file: string,
        private readonly state: SharedState,
        private readonly reportCalls: boolean,
    ) {
        super();
        this.imports = state.imports.get(file) ?? new ImportTable();
    }

    public scan(ast: AST): FunctionScanResult {
        this.walk(ast);
        this.state.functions.set(this.file, this.signatures);

        return {
            signatures: this.signatures,
            functions: [...this.functions.values()],
            violations: this.violations,
        };
    }

    protected visitDef(stmt: DefStatement): void {
        const signature = extractSignature(stmt, this.file);
        this.signatures.set(stmt.name, signature);
        this.functions.set(stmt.name, summarize(signature));

        super.visitDef(stmt);
    }

    protected visitCall(call: CallExpression): void {
        const callee = call.callee;

        if (callee.type === "Name") {
            this.checkNameCall(call, callee.id);
        } else if (
            callee.type === "Attribute" &&
            callee.object.type === "Name"
        ) {
            this.checkQualifiedCall(call, callee.object.id, callee.attr);
        } else {
            this.visitExpression(callee);
        }

        // Nested calls in arguments are checked on their own
        this.visitArguments(call);
    }

    // Reached for attributes that are not the callee of a call
    protected visitAttribute(expr: AttributeExpression): void {
        if (expr.object.type === "Name") {
            this.recordReference(expr.object.id, expr.attr);
        }
        super.visitAttribute(expr);
    }

    private checkNameCall(call: CallExpression, name: string) {
        const local =
            this.signatures.get(name) ??
            this.state.functions.get(this.file)?.get(name);
        if (local) {
            this.checkSignature(call, local);
            return;
        }

        if (this.isDefined(name) || isBuiltinFunction(name)) return;

        const matches: FunctionSignature[] = [];
        for (const [file, table] of this.state.functions) {
            const signature = table.get(name);
            if (file !== this.file && signature) matches.push(signature);
        }

        if (matches.length === 0) return;

        if (matches.length > 1) {
            // Ambiguous: record one edge, check nothing
            log.debug(
                `'${name}' is defined in ${matches.length} files; recording ${matches[0].file}`,
            );
            this.state.references.add(matches[0].file, name);
            return;
        }

        this.checkSignature(call, matches[0]);
        this.state.references.add(matches[0].file, name);
    }

    private checkQualifiedCall(
        call: CallExpression,
        objectName: string,
        functionName: string,
    ) {
        const qualified = `${objectName}.${functionName}`;
        const binding = this.imports.resolve(objectName);

        if (!binding) {
            if (this.isDefined(objectName) || isBuiltinModule(objectName))
                return;
            this.report(
                call,
                `Invalid object '${objectName}' in call to '${qualified}': object is not defined`,
            );
            return;
        }

        if (binding.kind === "external") {
            log.debug(`Skipping call into external package ${binding.packageId ?? binding.modulePath}`);
            return;
        }

        const target = this.findModuleFile(binding);
        if (!target) {
            this.report(
                call,
                `Could not resolve module '${objectName}' for call to '${qualified}'`,
            );
            return;
        }

        const table = this.state.functions.get(target);
        if (!table) {
            this.report(
                call,
                `Module '${objectName}' has not been analyzed for call to '${qualified}'`,
            );
            return;
        }

        const signature = table.get(functionName);
        if (!signature) {
            this.report(
                call,
                `Call to non-existent function '${functionName}' in module '${objectName}'`,
            );
            return;
        }

        this.checkSignature(call, signature);
        if (target !== this.file) {
            this.state.references.add(target, functionName);
        }
    }

    private recordReference(objectName: string, functionName: string) {
        const binding = this.imports.resolve(objectName);
        if (!binding || binding.kind === "external") return;

        const target = this.findModuleFile(binding);
        if (!target || target === this.file) return;

        if (this.state.functions.get(target)?.has(functionName)) {
            this.state.references.add(target, functionName);
        }
    }

    /**
     * Tries the resolved path, then the module path as written, then any
     * known file with the same base name.
     */
    private findModuleFile(binding: ImportBinding): string | undefined {
        const { moduleFiles } = this.state;
        const candidates = [
            binding.resolvedPath && withDialectExtension(binding.resolvedPath),
            withDialectExtension(binding.modulePath),
        ];

        for (const candidate of candidates) {
            if (!candidate) continue;
            const file = moduleFiles.get(candidate);
            if (file) return file;
        }

        const baseName = path.basename(withDialectExtension(binding.modulePath));
        for (const file of moduleFiles.values()) {
            if (path.basename(file) === baseName) return file;
        }
        return undefined;
    }

    private checkSignature(call: CallExpression, signature: FunctionSignature) {
        const label =
            signature.file === this.file
                ? signature.name
                : `${path.basename(signature.file)}:${signature.name}`;

        for (const message of checkCall(call, signature, label)) {
            this.report(call, message);
        }
    }

    private report(call: CallExpression, message: string) {
        if (!this.reportCalls) return;
        this.violations.push({
            file: this.file,
            line: call.loc.line,
            message,
        });
    }
}
