import { ImportTable } from "../scanner/ImportScanner";
import { FunctionTable } from "../scanner/signature";

/**
 * Set of `(file, function)` edges: the function defined in `file` is
 * called or referenced from some other file.
 */
export class ReferenceSet {
    private edges = new Map<string, Set<string>>();

    public add(file: string, functionName: string): void {
        let names = this.edges.get(file);
        if (!names) {
            names = new Set();
            this.edges.set(file, names);
        }
        names.add(functionName);
    }

    public has(file: string, functionName: string): boolean {
        return this.edges.get(file)?.has(functionName) ?? false;
    }

    public get size(): number {
        let count = 0;
        for (const names of this.edges.values()) count += names.size;
        return count;
    }
}

export interface SharedState {
    /** file -> import bindings and aliases of that file */
    imports: Map<string, ImportTable>;
    /** file -> function name -> signature */
    functions: Map<string, FunctionTable>;
    /** module path variant -> file */
    moduleFiles: Map<string, string>;
    references: ReferenceSet;
}

export function createSharedState(): SharedState {
    return {
        imports: new Map(),
        functions: new Map(),
        moduleFiles: new Map(),
        references: new ReferenceSet(),
    };
}
