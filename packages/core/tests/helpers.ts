import { parseSource } from "../src/orchestrator/Orchestrator";
import { Expression } from "../src/parser/expressions";
import { Statement } from "../src/parser/statements";

type StatementOf<K extends Statement["kind"]> = Extract<Statement, { kind: K }>;
type ExpressionOf<T extends Expression["type"]> = Extract<Expression, { type: T }>;

function isStatement<K extends Statement["kind"]>(
    stmt: Statement,
    kind: K,
): stmt is StatementOf<K> {
    return stmt.kind === kind;
}

function isExpression<T extends Expression["type"]>(
    expr: Expression,
    type: T,
): expr is ExpressionOf<T> {
    return expr.type === type;
}

export function statementOf<K extends Statement["kind"]>(
    stmt: Statement | undefined,
    kind: K,
): StatementOf<K> {
    if (!stmt || !isStatement(stmt, kind)) {
        throw new Error(`Expected ${kind}, got ${stmt?.kind ?? "nothing"}`);
    }
    return stmt;
}

export function expressionOf<T extends Expression["type"]>(
    expr: Expression | undefined,
    type: T,
): ExpressionOf<T> {
    if (!expr || !isExpression(expr, type)) {
        throw new Error(`Expected ${type}, got ${expr?.type ?? "nothing"}`);
    }
    return expr;
}

export function parseStatements(source: string): Statement[] {
    return parseSource(source).statements;
}

/** Value of the first statement of `source`, which must be an expression. */
export function parseExpression(source: string): Expression {
    return statementOf(parseStatements(source)[0], "ExpressionStatement")
        .expression;
}
