import { DefStatement } from "../parser/statements";
import { Expression } from "../parser/expressions";

export interface KeywordOnlyParameter {
    name: string;
    hasDefault: boolean;
}

export interface FunctionSignature {
    name: string;
    file: string;
    line: number;
    positional: string[];
    /** Defaults of the trailing positional parameters, in order. */
    defaults: Expression[];
    vararg?: string;
    kwonly: KeywordOnlyParameter[];
    kwarg?: string;
    documented: boolean;
}

/** What visibility judgment needs to know about a function. */
export type FunctionSummary = Pick<
    FunctionSignature,
    "name" | "line" | "documented"
>;

export type FunctionTable = Map<string, FunctionSignature>;

/**
 * A function is documented when its body opens with a string literal.
 */
export function isDocumented(def: DefStatement): boolean {
    const first = def.body[0];
    return (
        first !== undefined &&
        first.kind === "ExpressionStatement" &&
        first.expression.type === "StringLiteral"
    );
}

export function extractSignature(
    def: DefStatement,
    file: string,
): FunctionSignature {
    const { params } = def;
    const defaults: Expression[] = [];
    for (const param of params.positional) {
        if (param.default) defaults.push(param.default);
    }

    return {
        name: def.name,
        file,
        line: def.loc.line,
        positional: params.positional.map((p) => p.name),
        defaults,
        vararg: params.vararg,
        kwonly: params.kwonly.map((p) => ({
            name: p.name,
            hasDefault: p.default !== undefined,
        })),
        kwarg: params.kwarg,
        documented: isDocumented(def),
    };
}

export function summarize(signature: FunctionSignature): FunctionSummary {
    return {
        name: signature.name,
        line: signature.line,
        documented: signature.documented,
    };
}
