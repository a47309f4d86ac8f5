import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";

export interface ReturnStatement extends BaseStatement {
    kind: "ReturnStatement";
    value?: Expression;
}

export interface ControlStatement extends BaseStatement {
    kind: "PassStatement" | "BreakStatement" | "ContinueStatement";
}
