import { Expression } from "../parser/expressions";

/**
 * What an assignment told us about a name. Only aliases are followed;
 * the other variants exist so that a binding never loses its origin.
 */
export type SymbolicValue =
    | { kind: "Unknown" }
    | { kind: "NameAlias"; name: string }
    | { kind: "PositionalElement"; source: Expression; index: number }
    | { kind: "RawExpression"; expr: Expression };

export const UNKNOWN: SymbolicValue = { kind: "Unknown" };

export function symbolicValueOf(expr: Expression): SymbolicValue {
    if (expr.type === "Name") return { kind: "NameAlias", name: expr.id };
    return { kind: "RawExpression", expr };
}

interface Frame {
    names: Set<string>;
    values: Map<string, SymbolicValue>;
}

/**
 * Stack of lexical frames. Index 0 is the global frame and is pushed on
 * construction.
 */
export class ScopeStack {
    private frames: Frame[] = [];

    constructor() {
        this.enter();
    }

    public get depth(): number {
        return this.frames.length;
    }

    public isGlobal(): boolean {
        return this.frames.length === 1;
    }

    public enter(): void {
        this.frames.push({ names: new Set(), values: new Map() });
    }

    // Popping an empty stack is a no-op
    public exit(): void {
        this.frames.pop();
    }

    public bind(name: string): void {
        const top = this.frames[this.frames.length - 1];
        if (top) top.names.add(name);
    }

    public bindValue(name: string, value: SymbolicValue): void {
        const top = this.frames[this.frames.length - 1];
        if (!top) return;
        top.names.add(name);
        top.values.set(name, value);
    }

    public isBound(name: string): boolean {
        for (let i = this.frames.length - 1; i >= 0; i--) {
            if (this.frames[i].names.has(name)) return true;
        }
        return false;
    }

    public valueOf(name: string): SymbolicValue | undefined {
        for (let i = this.frames.length - 1; i >= 0; i--) {
            const value = this.frames[i].values.get(name);
            if (value) return value;
        }
        return undefined;
    }
}
