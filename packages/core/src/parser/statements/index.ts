import { DefStatement } from "./DefStatement";
import { AssignmentStatement, AugAssignStatement } from "./AssignmentStatement";
import { ExpressionStatement } from "./ExpressionStatement";
import { IfStatement } from "./IfStatement";
import { ForStatement, WhileStatement } from "./LoopStatement";
import { ReturnStatement, ControlStatement } from "./ReturnStatement";

export * from "./BaseStatement";
export * from "./DefStatement";
export * from "./AssignmentStatement";
export * from "./ExpressionStatement";
export * from "./IfStatement";
export * from "./LoopStatement";
export * from "./ReturnStatement";

export type Statement =
    | DefStatement
    | AssignmentStatement
    | AugAssignStatement
    | ExpressionStatement
    | IfStatement
    | ForStatement
    | WhileStatement
    | ReturnStatement
    | ControlStatement;

export type StatementKind = Statement["kind"];
