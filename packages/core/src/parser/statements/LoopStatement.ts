import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { Statement } from "./index";

export interface ForStatement extends BaseStatement {
    kind: "ForStatement";
    target: Expression;
    iterable: Expression;
    body: Statement[];
    orelse: Statement[];
}

export interface WhileStatement extends BaseStatement {
    kind: "WhileStatement";
    condition: Expression;
    body: Statement[];
    orelse: Statement[];
}
