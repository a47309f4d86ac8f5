import { AST, ParameterList } from "../parser/types";
import {
    AttributeExpression,
    BinaryExpression,
    CallExpression,
    ComprehensionExpression,
    ConditionalExpression,
    DictExpression,
    Expression,
    LambdaExpression,
    ListExpression,
    NameExpression,
    SetExpression,
    SliceExpression,
    StarredExpression,
    SubscriptExpression,
    TupleExpression,
    UnaryExpression,
} from "../parser/expressions";
import {
    AssignmentStatement,
    AugAssignStatement,
    DefStatement,
    ExpressionStatement,
    ForStatement,
    IfStatement,
    ReturnStatement,
    Statement,
    WhileStatement,
} from "../parser/statements";
import { ScopeStack, UNKNOWN, symbolicValueOf } from "./ScopeStack";

type StatementMap = { [S in Statement as S["kind"]]: S };
type ExpressionMap = { [E in Expression as E["type"]]: E };

type StatementHandlers = {
    [K in keyof StatementMap]: (stmt: StatementMap[K]) => void;
};
type ExpressionHandlers = {
    [K in keyof ExpressionMap]: (expr: ExpressionMap[K]) => void;
};

/**
 * Names a body binds anywhere outside nested functions, lambdas and
 * comprehensions. They are visible throughout the body.
 */
export function assignedNames(
    statements: Statement[],
    into: Set<string> = new Set(),
): Set<string> {
    for (const stmt of statements) {
        switch (stmt.kind) {
            case "DefStatement":
                into.add(stmt.name);
                break;
            case "AssignmentStatement":
                for (const target of stmt.targets) targetNames(target, into);
                break;
            case "AugAssignStatement":
                targetNames(stmt.target, into);
                break;
            case "ForStatement":
                targetNames(stmt.target, into);
                assignedNames(stmt.body, into);
                assignedNames(stmt.orelse, into);
                break;
            case "WhileStatement":
                assignedNames(stmt.body, into);
                assignedNames(stmt.orelse, into);
                break;
            case "IfStatement":
                assignedNames(stmt.thenBranch, into);
                assignedNames(stmt.elseBranch, into);
                break;
        }
    }
    return into;
}

function targetNames(target: Expression, into: Set<string>) {
    if (target.type === "Name") {
        into.add(target.id);
    } else if (target.type === "Tuple" || target.type === "List") {
        for (const element of target.elements) targetNames(element, into);
    } else if (target.type === "Starred") {
        targetNames(target.value, into);
    }
}

/**
 * Recursive descent over a parsed file with scope bookkeeping.
 *
 * Function bodies, each `if` branch, loop bodies (with their `else`),
 * lambdas and comprehensions get a frame of their own. Subclasses
 * override the `visit*` hooks and call through to keep the bookkeeping.
 */
export class Walker {
    protected readonly scope = new ScopeStack();
    /** Every name the module binds; visible inside function bodies. */
    private moduleNames: Set<string> = new Set();
    private functionDepth = 0;

    private readonly statementHandlers: StatementHandlers = {
        DefStatement: (stmt) => this.visitDef(stmt),
        AssignmentStatement: (stmt) => this.visitAssignment(stmt),
        AugAssignStatement: (stmt) => this.visitAugAssign(stmt),
        ExpressionStatement: (stmt) => this.visitExpressionStatement(stmt),
        IfStatement: (stmt) => this.visitIf(stmt),
        ForStatement: (stmt) => this.visitFor(stmt),
        WhileStatement: (stmt) => this.visitWhile(stmt),
        ReturnStatement: (stmt) => this.visitReturn(stmt),
        PassStatement: () => {},
        BreakStatement: () => {},
        ContinueStatement: () => {},
    };

    private readonly expressionHandlers: ExpressionHandlers = {
        Name: (expr) => this.visitName(expr),
        StringLiteral: () => {},
        NumberLiteral: () => {},
        ConstantLiteral: () => {},
        Attribute: (expr) => this.visitAttribute(expr),
        Subscript: (expr) => this.visitSubscript(expr),
        Slice: (expr) => this.visitSlice(expr),
        Call: (expr) => this.visitCall(expr),
        Starred: (expr) => this.visitStarred(expr),
        List: (expr) => this.visitSequence(expr),
        Tuple: (expr) => this.visitSequence(expr),
        Set: (expr) => this.visitSequence(expr),
        Dict: (expr) => this.visitDict(expr),
        Comprehension: (expr) => this.visitComprehension(expr),
        Lambda: (expr) => this.visitLambda(expr),
        BinaryExpression: (expr) => this.visitBinary(expr),
        UnaryExpression: (expr) => this.visitUnary(expr),
        ConditionalExpression: (expr) => this.visitConditional(expr),
    };

    // Module-level names bind in order; function bodies run later and see all of them
    public walk(ast: AST): void {
        this.moduleNames = assignedNames(ast.statements);
        this.visitBlock(ast.statements);
    }

    protected isDefined(name: string): boolean {
        return (
            this.scope.isBound(name) ||
            (this.functionDepth > 0 && this.moduleNames.has(name))
        );
    }

    private inFunction(body: () => void): void {
        this.functionDepth++;
        try {
            this.withScope(body);
        } finally {
            this.functionDepth--;
        }
    }

    /** Runs `body` inside a fresh frame that is popped even on error. */
    protected withScope(body: () => void): void {
        this.scope.enter();
        try {
            body();
        } finally {
            this.scope.exit();
        }
    }

    protected hoist(statements: Statement[]): void {
        for (const name of assignedNames(statements)) {
            this.scope.bind(name);
        }
    }

    protected visitBlock(statements: Statement[]): void {
        for (const stmt of statements) {
            this.visitStatement(stmt);
        }
    }

    protected visitStatement(stmt: Statement): void {
        this.dispatchStatement(stmt.kind, stmt);
    }

    protected visitExpression(expr: Expression): void {
        this.dispatchExpression(expr.type, expr);
    }

    private dispatchStatement<K extends keyof StatementMap>(
        kind: K,
        stmt: StatementMap[K],
    ) {
        this.statementHandlers[kind](stmt);
    }

    private dispatchExpression<K extends keyof ExpressionMap>(
        type: K,
        expr: ExpressionMap[K],
    ) {
        this.expressionHandlers[type](expr);
    }

    protected visitDef(stmt: DefStatement): void {
        this.scope.bind(stmt.name);
        this.visitDefaults(stmt.params);

        this.inFunction(() => {
            this.bindParameters(stmt.params);
            this.hoist(stmt.body);
            this.visitBlock(stmt.body);
        });
    }

    // Defaults are evaluated in the enclosing scope
    protected visitDefaults(params: ParameterList): void {
        for (const param of [...params.positional, ...params.kwonly]) {
            if (param.default) this.visitExpression(param.default);
        }
    }

    protected bindParameters(params: ParameterList): void {
        for (const param of params.positional) this.scope.bind(param.name);
        if (params.vararg) this.scope.bind(params.vararg);
        for (const param of params.kwonly) this.scope.bind(param.name);
        if (params.kwarg) this.scope.bind(params.kwarg);
    }

    protected visitAssignment(stmt: AssignmentStatement): void {
        this.visitExpression(stmt.value);
        for (const target of stmt.targets) {
            this.assignTarget(target, stmt.value);
        }
    }

    /**
     * Binds `target` in the current frame. Destructuring a literal
     * sequence pairs elements up; any other value is recorded per
     * position.
     */
    protected assignTarget(target: Expression, value?: Expression): void {
        switch (target.type) {
            case "Name":
                this.scope.bindValue(
                    target.id,
                    value ? symbolicValueOf(value) : UNKNOWN,
                );
                return;

            case "Tuple":
            case "List": {
                const literal =
                    value &&
                    (value.type === "Tuple" || value.type === "List") &&
                    !value.elements.some((e) => e.type === "Starred")
                        ? value.elements
                        : undefined;

                target.elements.forEach((element, index) => {
                    if (literal && index < literal.length) {
                        this.assignTarget(element, literal[index]);
                    } else if (element.type === "Name" && value) {
                        this.scope.bindValue(element.id, {
                            kind: "PositionalElement",
                            source: value,
                            index,
                        });
                    } else {
                        this.assignTarget(element);
                    }
                });
                return;
            }

            case "Starred":
                this.assignTarget(target.value);
                return;

            default:
                // obj.attr = ..., obj[key] = ...
                this.visitExpression(target);
        }
    }

    protected visitAugAssign(stmt: AugAssignStatement): void {
        this.visitExpression(stmt.value);
        if (stmt.target.type === "Name") {
            this.scope.bind(stmt.target.id);
        } else {
            this.visitExpression(stmt.target);
        }
    }

    protected visitExpressionStatement(stmt: ExpressionStatement): void {
        this.visitExpression(stmt.expression);
    }

    protected visitReturn(stmt: ReturnStatement): void {
        if (stmt.value) this.visitExpression(stmt.value);
    }

    protected visitIf(stmt: IfStatement): void {
        this.visitExpression(stmt.condition);
        this.withScope(() => this.visitBlock(stmt.thenBranch));
        this.withScope(() => this.visitBlock(stmt.elseBranch));
        // Names a branch assigns stay bound after the statement
        this.hoist([stmt]);
    }

    protected visitFor(stmt: ForStatement): void {
        this.visitExpression(stmt.iterable);
        this.withScope(() => {
            this.assignTarget(stmt.target);
            this.visitBlock(stmt.body);
            this.visitBlock(stmt.orelse);
        });
        this.hoist([stmt]);
    }

    protected visitWhile(stmt: WhileStatement): void {
        this.visitExpression(stmt.condition);
        this.withScope(() => {
            this.visitBlock(stmt.body);
            this.visitBlock(stmt.orelse);
        });
        this.hoist([stmt]);
    }

    protected visitName(_expr: NameExpression): void {}

    protected visitAttribute(expr: AttributeExpression): void {
        this.visitExpression(expr.object);
    }

    protected visitSubscript(expr: SubscriptExpression): void {
        this.visitExpression(expr.object);
        this.visitExpression(expr.index);
    }

    protected visitSlice(expr: SliceExpression): void {
        if (expr.lower) this.visitExpression(expr.lower);
        if (expr.upper) this.visitExpression(expr.upper);
        if (expr.step) this.visitExpression(expr.step);
    }

    protected visitCall(expr: CallExpression): void {
        this.visitExpression(expr.callee);
        this.visitArguments(expr);
    }

    protected visitArguments(expr: CallExpression): void {
        for (const arg of expr.arguments) this.visitExpression(arg);
        for (const keyword of expr.keywords) this.visitExpression(keyword.value);
    }

    protected visitStarred(expr: StarredExpression): void {
        this.visitExpression(expr.value);
    }

    protected visitSequence(
        expr: ListExpression | TupleExpression | SetExpression,
    ): void {
        for (const element of expr.elements) this.visitExpression(element);
    }

    protected visitDict(expr: DictExpression): void {
        for (const entry of expr.entries) {
            if (entry.key) this.visitExpression(entry.key);
            this.visitExpression(entry.value);
        }
    }

    /**
     * The first iterable is evaluated outside the comprehension; every
     * target is bound inside its frame.
     */
    protected visitComprehension(expr: ComprehensionExpression): void {
        const first = expr.clauses[0];
        if (first && first.kind === "for") {
            this.visitExpression(first.iterable);
        }

        this.withScope(() => {
            expr.clauses.forEach((clause, index) => {
                if (clause.kind === "if") {
                    this.visitExpression(clause.condition);
                    return;
                }
                if (index > 0) this.visitExpression(clause.iterable);
                this.assignTarget(clause.target);
            });

            this.visitExpression(expr.element);
            if (expr.value) this.visitExpression(expr.value);
        });
    }

    protected visitLambda(expr: LambdaExpression): void {
        this.visitDefaults(expr.params);
        this.inFunction(() => {
            this.bindParameters(expr.params);
            this.visitExpression(expr.body);
        });
    }

    protected visitBinary(expr: BinaryExpression): void {
        this.visitExpression(expr.left);
        this.visitExpression(expr.right);
    }

    protected visitUnary(expr: UnaryExpression): void {
        this.visitExpression(expr.operand);
    }

    protected visitConditional(expr: ConditionalExpression): void {
        this.visitExpression(expr.test);
        this.visitExpression(expr.body);
        this.visitExpression(expr.orelse);
    }
}
