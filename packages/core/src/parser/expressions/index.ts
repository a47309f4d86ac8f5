import { ParameterList, SourceLocation } from "../types";

export type Expression =
    | NameExpression
    | StringLiteral
    | NumberLiteral
    | ConstantLiteral
    | AttributeExpression
    | SubscriptExpression
    | SliceExpression
    | CallExpression
    | StarredExpression
    | ListExpression
    | TupleExpression
    | SetExpression
    | DictExpression
    | ComprehensionExpression
    | LambdaExpression
    | BinaryExpression
    | UnaryExpression
    | ConditionalExpression;

export type ExpressionType = Expression["type"];

export interface NameExpression {
    type: "Name";
    id: string;
    loc: SourceLocation;
}

export interface StringLiteral {
    type: "StringLiteral";
    value: string;
    loc: SourceLocation;
}

export interface NumberLiteral {
    type: "NumberLiteral";
    raw: string;
    loc: SourceLocation;
}

export interface ConstantLiteral {
    type: "ConstantLiteral";
    value: "True" | "False" | "None";
    loc: SourceLocation;
}

export interface AttributeExpression {
    type: "Attribute";
    object: Expression;
    attr: string;
    loc: SourceLocation;
}

export interface SubscriptExpression {
    type: "Subscript";
    object: Expression;
    index: Expression;
    loc: SourceLocation;
}

export interface SliceExpression {
    type: "Slice";
    lower?: Expression;
    upper?: Expression;
    step?: Expression;
    loc: SourceLocation;
}

/** `name=value`, or `**value` when `name` is absent. */
export interface KeywordArgument {
    name?: string;
    value: Expression;
    loc: SourceLocation;
}

export interface CallExpression {
    type: "Call";
    callee: Expression;
    arguments: Expression[];
    keywords: KeywordArgument[];
    loc: SourceLocation;
}

export interface StarredExpression {
    type: "Starred";
    value: Expression;
    loc: SourceLocation;
}

export interface ListExpression {
    type: "List";
    elements: Expression[];
    loc: SourceLocation;
}

export interface TupleExpression {
    type: "Tuple";
    elements: Expression[];
    loc: SourceLocation;
}

export interface SetExpression {
    type: "Set";
    elements: Expression[];
    loc: SourceLocation;
}

/** `key: value`, or `**value` when `key` is absent. */
export interface DictEntry {
    key?: Expression;
    value: Expression;
}

export interface DictExpression {
    type: "Dict";
    entries: DictEntry[];
    loc: SourceLocation;
}

export type ComprehensionClause =
    | { kind: "for"; target: Expression; iterable: Expression }
    | { kind: "if"; condition: Expression };

export interface ComprehensionExpression {
    type: "Comprehension";
    form: "list" | "set" | "dict" | "generator";
    element: Expression;
    // dict comprehensions only
    value?: Expression;
    clauses: ComprehensionClause[];
    loc: SourceLocation;
}

export interface LambdaExpression {
    type: "Lambda";
    params: ParameterList;
    body: Expression;
    loc: SourceLocation;
}

export interface BinaryExpression {
    type: "BinaryExpression";
    operator: string;
    left: Expression;
    right: Expression;
    loc: SourceLocation;
}

export interface UnaryExpression {
    type: "UnaryExpression";
    operator: "-" | "+" | "~" | "not";
    operand: Expression;
    loc: SourceLocation;
}

export interface ConditionalExpression {
    type: "ConditionalExpression";
    test: Expression;
    body: Expression;
    orelse: Expression;
    loc: SourceLocation;
}
