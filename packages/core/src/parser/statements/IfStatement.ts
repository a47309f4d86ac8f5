import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { SourceLocation } from "../types";
import { Statement } from "./index";

/**
 * `elif` chains are nested: the else branch then holds a single
 * IfStatement.
 */
export class IfStatement implements BaseStatement {
    kind = "IfStatement" as const;

    constructor(
        public condition: Expression,
        public thenBranch: Statement[],
        public elseBranch: Statement[],
        public loc: SourceLocation,
    ) {}
}
