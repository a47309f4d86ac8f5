import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { SourceLocation } from "../types";

/**
 * `a = b = value`: every entry of `targets` receives `value`.
 */
export class AssignmentStatement implements BaseStatement {
    kind = "AssignmentStatement" as const;

    constructor(
        public targets: Expression[],
        public value: Expression,
        public loc: SourceLocation,
    ) {}
}

export interface AugAssignStatement extends BaseStatement {
    kind: "AugAssignStatement";
    target: Expression;
    operator: string;
    value: Expression;
}
