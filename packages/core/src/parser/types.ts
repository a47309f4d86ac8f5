import { Statement } from "./statements";
import { Expression } from "./expressions";

export type ASTNode = Statement | Expression;

export interface AST {
    statements: Statement[];
}

export interface SourceLocation {
    line: number;
    col: number;
    len?: number;
    endLine: number;
    endCol: number;
}

export interface Parameter {
    name: string;
    default?: Expression;
    loc: SourceLocation;
}

/**
 * Parameter shape of a `def` or `lambda`. Parameters after a bare `*`
 * or after `*args` are keyword-only.
 */
export interface ParameterList {
    positional: Parameter[];
    vararg?: string;
    kwonly: Parameter[];
    kwarg?: string;
}
