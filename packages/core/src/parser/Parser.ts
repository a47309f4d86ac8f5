import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { AST, Parameter, ParameterList, SourceLocation } from "./types";
import {
    CallExpression,
    ComprehensionClause,
    ComprehensionExpression,
    DictEntry,
    Expression,
    KeywordArgument,
    LambdaExpression,
} from "./expressions";
import {
    Statement,
    DefStatement,
    IfStatement,
    AssignmentStatement,
    ForStatement,
    WhileStatement,
    ReturnStatement,
} from "./statements";
import { StarcheckError } from "../utils/Error";

const COMPARISON_OPERATORS = [
    TokenType.Less,
    TokenType.Greater,
    TokenType.EqualEqual,
    TokenType.NotEqual,
    TokenType.LessEqual,
    TokenType.GreaterEqual,
];

// Tokens that may begin an expression
const EXPRESSION_START = [
    TokenType.Identifier,
    TokenType.NumberLiteral,
    TokenType.StringLiteral,
    TokenType.True,
    TokenType.False,
    TokenType.None,
    TokenType.LParen,
    TokenType.LBracket,
    TokenType.LBrace,
    TokenType.Minus,
    TokenType.Plus,
    TokenType.Tilde,
    TokenType.Not,
    TokenType.Lambda,
    TokenType.Star,
];

export class Parser {
    private tokens: Token[];
    private source?: string;
    private current: number = 0;

    constructor(tokens: Token[], source?: string) {
        this.tokens = tokens;
        this.source = source;
    }

    public parse(): AST {
        const statements: Statement[] = [];
        while (!this.isAtEnd()) {
            if (this.match(TokenType.Semicolon, TokenType.Newline)) continue;
            statements.push(this.statement());
        }
        return { statements };
    }

    private getLoc(token: Token): SourceLocation {
        return {
            line: token.line,
            col: token.col,
            len: token.length || token.value.length,
            endLine: token.line,
            endCol: token.col + (token.length || token.value.length),
        };
    }

    private mergeLoc(
        start: SourceLocation | undefined,
        end: SourceLocation | undefined,
    ): SourceLocation {
        if (!start)
            return end || { line: 0, col: 0, endLine: 0, endCol: 0, len: 0 };
        if (!end) return start;

        const len =
            start.line === end.endLine ? end.endCol - start.col : start.len;

        return {
            line: start.line,
            col: start.col,
            len: len,
            endLine: end.endLine,
            endCol: end.endCol,
        };
    }

    private statement(): Statement {
        if (this.match(TokenType.Def)) {
            return this.defStatement();
        }
        if (this.match(TokenType.If)) {
            return this.ifStatement();
        }
        if (this.match(TokenType.For)) {
            return this.forStatement();
        }
        if (this.match(TokenType.While)) {
            return this.whileStatement();
        }

        const statement = this.simpleStatement();
        this.endOfSimpleStatement();
        return statement;
    }

    private endOfSimpleStatement() {
        if (this.match(TokenType.Semicolon)) {
            this.match(TokenType.Newline);
            return;
        }
        if (this.match(TokenType.Newline)) return;
        if (this.isAtEnd() || this.check(TokenType.Dedent)) return;

        throw this.error(
            this.peek(),
            `Expected end of statement, found "${this.peek().value}"`,
        );
    }

    private simpleStatement(): Statement {
        if (this.match(TokenType.Return)) {
            return this.returnStatement();
        }

        if (this.match(TokenType.Pass, TokenType.Break, TokenType.Continue)) {
            const token = this.previous();
            const kind =
                token.type === TokenType.Pass
                    ? "PassStatement"
                    : token.type === TokenType.Break
                      ? "BreakStatement"
                      : "ContinueStatement";
            return { kind, loc: this.getLoc(token) };
        }

        const first = this.expressionList();

        if (this.check(TokenType.Equals)) {
            return this.assignmentStatement(first);
        }

        if (this.match(TokenType.AugAssign)) {
            const operator = this.previous().value;
            const value = this.expressionList();
            return {
                kind: "AugAssignStatement",
                target: first,
                operator,
                value,
                loc: this.mergeLoc(first.loc, value.loc),
            };
        }

        return {
            kind: "ExpressionStatement",
            expression: first,
            loc: first.loc,
        };
    }

    private assignmentStatement(first: Expression): AssignmentStatement {
        // a = b = value
        const chain: Expression[] = [first];
        while (this.match(TokenType.Equals)) {
            chain.push(this.expressionList());
        }

        const value = chain[chain.length - 1];
        const targets = chain.slice(0, -1);

        return new AssignmentStatement(
            targets,
            value,
            this.mergeLoc(first.loc, value.loc),
        );
    }

    private returnStatement(): ReturnStatement {
        const keyword = this.previous();
        let value: Expression | undefined;

        if (this.startsExpression()) {
            value = this.expressionList();
        }

        return {
            kind: "ReturnStatement",
            value,
            loc: this.mergeLoc(
                this.getLoc(keyword),
                value ? value.loc : undefined,
            ),
        };
    }

    private defStatement(): DefStatement {
        // def name(params) -> annotation: body
        const startToken = this.previous();
        const nameToken = this.consume(
            TokenType.Identifier,
            "Expected function name",
        );

        this.consume(TokenType.LParen, "Expected '(' after function name");
        const params = this.parameterList(TokenType.RParen, true);
        this.consume(TokenType.RParen, "Expected ')' after parameters");

        if (this.match(TokenType.Arrow)) {
            // Return annotations carry no meaning for the analysis
            this.test();
        }

        const body = this.block();

        return new DefStatement(
            nameToken.value,
            params,
            body,
            this.mergeLoc(this.getLoc(startToken), this.getLoc(nameToken)),
        );
    }

    /**
     * Parses parameters up to (not including) `terminator`. Annotations
     * are allowed in `def` but not in `lambda`, where `:` ends the list.
     */
    private parameterList(
        terminator: TokenType,
        allowAnnotations: boolean,
    ): ParameterList {
        const params: ParameterList = { positional: [], kwonly: [] };
        let keywordOnly = false;

        while (!this.check(terminator)) {
            if (this.match(TokenType.Star)) {
                keywordOnly = true;
                if (this.check(TokenType.Identifier)) {
                    params.vararg = this.advance().value;
                    this.annotation(allowAnnotations);
                }
            } else if (this.match(TokenType.DoubleStar)) {
                params.kwarg = this.consume(
                    TokenType.Identifier,
                    "Expected parameter name after '**'",
                ).value;
                this.annotation(allowAnnotations);
            } else {
                const nameToken = this.consume(
                    TokenType.Identifier,
                    "Expected parameter name",
                );
                this.annotation(allowAnnotations);

                const param: Parameter = {
                    name: nameToken.value,
                    loc: this.getLoc(nameToken),
                };
                if (this.match(TokenType.Equals)) {
                    param.default = this.test();
                }

                if (keywordOnly) params.kwonly.push(param);
                else params.positional.push(param);
            }

            if (!this.match(TokenType.Comma)) break;
        }

        return params;
    }

    private annotation(allowed: boolean) {
        if (allowed && this.match(TokenType.Colon)) {
            this.test();
        }
    }

    /**
     * Suite after `:`, either an indented block or simple statements on
     * the same line.
     */
    private block(): Statement[] {
        this.consume(TokenType.Colon, "Expected ':'");
        const statements: Statement[] = [];

        if (this.match(TokenType.Newline)) {
            this.consume(TokenType.Indent, "Expected an indented block");
            while (!this.check(TokenType.Dedent) && !this.isAtEnd()) {
                if (this.match(TokenType.Semicolon, TokenType.Newline))
                    continue;
                statements.push(this.statement());
            }
            this.match(TokenType.Dedent);
            return statements;
        }

        do {
            statements.push(this.simpleStatement());
        } while (
            this.match(TokenType.Semicolon) &&
            !this.check(TokenType.Newline) &&
            !this.isAtEnd()
        );
        this.endOfSimpleStatement();

        return statements;
    }

    private ifStatement(): IfStatement {
        const startToken = this.previous();
        const condition = this.test();
        const thenBranch = this.block();

        let elseBranch: Statement[] = [];
        if (this.match(TokenType.Elif)) {
            elseBranch = [this.ifStatement()];
        } else if (this.match(TokenType.Else)) {
            elseBranch = this.block();
        }

        return new IfStatement(
            condition,
            thenBranch,
            elseBranch,
            this.mergeLoc(this.getLoc(startToken), condition.loc),
        );
    }

    private forStatement(): ForStatement {
        const startToken = this.previous();
        const target = this.targetList();
        this.consume(TokenType.In, "Expected 'in' after loop target");
        const iterable = this.expressionList();
        const body = this.block();
        const orelse = this.match(TokenType.Else) ? this.block() : [];

        return {
            kind: "ForStatement",
            target,
            iterable,
            body,
            orelse,
            loc: this.mergeLoc(this.getLoc(startToken), iterable.loc),
        };
    }

    private whileStatement(): WhileStatement {
        const startToken = this.previous();
        const condition = this.test();
        const body = this.block();
        const orelse = this.match(TokenType.Else) ? this.block() : [];

        return {
            kind: "WhileStatement",
            condition,
            body,
            orelse,
            loc: this.mergeLoc(this.getLoc(startToken), condition.loc),
        };
    }

    /**
     * Comma-separated expressions; more than one, or a trailing comma,
     * makes a tuple.
     */
    private expressionList(): Expression {
        const first = this.starOrTest();
        if (!this.check(TokenType.Comma)) return first;

        const elements = [first];
        while (this.match(TokenType.Comma)) {
            if (!this.startsExpression()) break;
            elements.push(this.starOrTest());
        }

        return {
            type: "Tuple",
            elements,
            loc: this.mergeLoc(first.loc, this.getLoc(this.previous())),
        };
    }

    // Loop targets stop before `in`, so they are parsed below comparisons
    private targetList(): Expression {
        const first = this.starOrBitOr();
        if (!this.check(TokenType.Comma)) return first;

        const elements = [first];
        while (this.match(TokenType.Comma)) {
            if (this.check(TokenType.In)) break;
            elements.push(this.starOrBitOr());
        }

        return {
            type: "Tuple",
            elements,
            loc: this.mergeLoc(first.loc, elements[elements.length - 1].loc),
        };
    }

    private starOrTest(): Expression {
        if (this.match(TokenType.Star)) {
            const star = this.previous();
            const value = this.bitOr();
            return {
                type: "Starred",
                value,
                loc: this.mergeLoc(this.getLoc(star), value.loc),
            };
        }
        return this.test();
    }

    private starOrBitOr(): Expression {
        if (this.match(TokenType.Star)) {
            const star = this.previous();
            const value = this.bitOr();
            return {
                type: "Starred",
                value,
                loc: this.mergeLoc(this.getLoc(star), value.loc),
            };
        }
        return this.bitOr();
    }

    private test(): Expression {
        if (this.match(TokenType.Lambda)) {
            return this.lambdaExpression();
        }

        const body = this.orTest();
        if (this.match(TokenType.If)) {
            const condition = this.orTest();
            this.consume(
                TokenType.Else,
                "Expected 'else' in conditional expression",
            );
            const orelse = this.test();
            return {
                type: "ConditionalExpression",
                test: condition,
                body,
                orelse,
                loc: this.mergeLoc(body.loc, orelse.loc),
            };
        }
        return body;
    }

    private lambdaExpression(): LambdaExpression {
        const startToken = this.previous();
        const params = this.parameterList(TokenType.Colon, false);
        this.consume(TokenType.Colon, "Expected ':' after lambda parameters");
        const body = this.test();

        return {
            type: "Lambda",
            params,
            body,
            loc: this.mergeLoc(this.getLoc(startToken), body.loc),
        };
    }

    private orTest(): Expression {
        let left = this.andTest();
        while (this.match(TokenType.Or)) {
            const right = this.andTest();
            left = this.binary("or", left, right);
        }
        return left;
    }

    private andTest(): Expression {
        let left = this.notTest();
        while (this.match(TokenType.And)) {
            const right = this.notTest();
            left = this.binary("and", left, right);
        }
        return left;
    }

    private notTest(): Expression {
        if (this.match(TokenType.Not)) {
            const token = this.previous();
            const operand = this.notTest();
            return {
                type: "UnaryExpression",
                operator: "not",
                operand,
                loc: this.mergeLoc(this.getLoc(token), operand.loc),
            };
        }
        return this.comparison();
    }

    private comparison(): Expression {
        let left = this.bitOr();

        while (true) {
            let operator: string;
            if (this.match(...COMPARISON_OPERATORS)) {
                operator = this.previous().value;
            } else if (this.match(TokenType.In)) {
                operator = "in";
            } else if (
                this.check(TokenType.Not) &&
                this.peekNext().type === TokenType.In
            ) {
                this.advance();
                this.advance();
                operator = "not in";
            } else if (this.match(TokenType.Is)) {
                operator = this.match(TokenType.Not) ? "is not" : "is";
            } else {
                break;
            }

            const right = this.bitOr();
            left = this.binary(operator, left, right);
        }

        return left;
    }

    private bitOr(): Expression {
        let left = this.bitXor();
        while (this.match(TokenType.Pipe)) {
            left = this.binary("|", left, this.bitXor());
        }
        return left;
    }

    private bitXor(): Expression {
        let left = this.bitAnd();
        while (this.match(TokenType.Caret)) {
            left = this.binary("^", left, this.bitAnd());
        }
        return left;
    }

    private bitAnd(): Expression {
        let left = this.shift();
        while (this.match(TokenType.Ampersand)) {
            left = this.binary("&", left, this.shift());
        }
        return left;
    }

    private shift(): Expression {
        let left = this.term();
        while (this.match(TokenType.ShiftLeft, TokenType.ShiftRight)) {
            const operator = this.previous().value;
            left = this.binary(operator, left, this.term());
        }
        return left;
    }

    private term(): Expression {
        let left = this.factor();
        while (this.match(TokenType.Plus, TokenType.Minus)) {
            const operator = this.previous().value;
            left = this.binary(operator, left, this.factor());
        }
        return left;
    }

    private factor(): Expression {
        let left = this.unary();
        while (
            this.match(
                TokenType.Star,
                TokenType.Slash,
                TokenType.DoubleSlash,
                TokenType.Percent,
            )
        ) {
            const operator = this.previous().value;
            left = this.binary(operator, left, this.unary());
        }
        return left;
    }

    private unary(): Expression {
        if (this.match(TokenType.Minus, TokenType.Plus, TokenType.Tilde)) {
            const token = this.previous();
            const operand = this.unary();
            const operator =
                token.type === TokenType.Minus
                    ? "-"
                    : token.type === TokenType.Plus
                      ? "+"
                      : "~";
            return {
                type: "UnaryExpression",
                operator,
                operand,
                loc: this.mergeLoc(this.getLoc(token), operand.loc),
            };
        }
        return this.power();
    }

    private power(): Expression {
        const base = this.postfix();
        if (this.match(TokenType.DoubleStar)) {
            // right associative, binds tighter than unary on its left only
            return this.binary("**", base, this.unary());
        }
        return base;
    }

    private binary(
        operator: string,
        left: Expression,
        right: Expression,
    ): Expression {
        return {
            type: "BinaryExpression",
            operator,
            left,
            right,
            loc: this.mergeLoc(left.loc, right.loc),
        };
    }

    private postfix(): Expression {
        let expr = this.primary();

        while (true) {
            if (this.match(TokenType.LParen)) {
                expr = this.finishCall(expr);
            } else if (this.match(TokenType.LBracket)) {
                const index = this.subscriptList();
                const endToken = this.consume(
                    TokenType.RBracket,
                    "Expected ']'",
                );
                expr = {
                    type: "Subscript",
                    object: expr,
                    index,
                    loc: this.mergeLoc(expr.loc, this.getLoc(endToken)),
                };
            } else if (this.match(TokenType.Dot)) {
                const nameToken = this.consume(
                    TokenType.Identifier,
                    "Expected attribute name after '.'",
                );
                expr = {
                    type: "Attribute",
                    object: expr,
                    attr: nameToken.value,
                    loc: this.mergeLoc(expr.loc, this.getLoc(nameToken)),
                };
            } else {
                break;
            }
        }

        return expr;
    }

    private subscriptList(): Expression {
        const first = this.subscriptItem();
        if (!this.check(TokenType.Comma)) return first;

        const elements = [first];
        while (this.match(TokenType.Comma)) {
            if (this.check(TokenType.RBracket)) break;
            elements.push(this.subscriptItem());
        }
        return {
            type: "Tuple",
            elements,
            loc: this.mergeLoc(first.loc, elements[elements.length - 1].loc),
        };
    }

    private subscriptItem(): Expression {
        const startToken = this.peek();
        let lower: Expression | undefined;

        if (!this.check(TokenType.Colon)) {
            lower = this.test();
            if (!this.check(TokenType.Colon)) return lower;
        }

        this.consume(TokenType.Colon, "Expected ':' in slice");
        let upper: Expression | undefined;
        let step: Expression | undefined;

        if (this.startsExpression()) {
            upper = this.test();
        }
        if (this.match(TokenType.Colon) && this.startsExpression()) {
            step = this.test();
        }

        return {
            type: "Slice",
            lower,
            upper,
            step,
            loc: this.mergeLoc(
                this.getLoc(startToken),
                this.getLoc(this.previous()),
            ),
        };
    }

    private finishCall(callee: Expression): CallExpression {
        const args: Expression[] = [];
        const keywords: KeywordArgument[] = [];

        while (!this.check(TokenType.RParen)) {
            if (this.match(TokenType.Star)) {
                const star = this.previous();
                const value = this.test();
                args.push({
                    type: "Starred",
                    value,
                    loc: this.mergeLoc(this.getLoc(star), value.loc),
                });
            } else if (this.match(TokenType.DoubleStar)) {
                const star = this.previous();
                const value = this.test();
                keywords.push({
                    value,
                    loc: this.mergeLoc(this.getLoc(star), value.loc),
                });
            } else if (
                this.check(TokenType.Identifier) &&
                this.peekNext().type === TokenType.Equals
            ) {
                const nameToken = this.advance();
                this.advance();
                const value = this.test();
                keywords.push({
                    name: nameToken.value,
                    value,
                    loc: this.mergeLoc(this.getLoc(nameToken), value.loc),
                });
            } else {
                const arg = this.test();
                args.push(
                    this.check(TokenType.For)
                        ? this.comprehension("generator", arg, arg.loc)
                        : arg,
                );
            }

            if (!this.match(TokenType.Comma)) break;
        }

        const endToken = this.consume(TokenType.RParen, "Expected ')'");
        return {
            type: "Call",
            callee,
            arguments: args,
            keywords,
            loc: this.mergeLoc(callee.loc, this.getLoc(endToken)),
        };
    }

    private primary(): Expression {
        if (this.match(TokenType.NumberLiteral)) {
            const token = this.previous();
            return {
                type: "NumberLiteral",
                raw: token.value,
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.StringLiteral)) {
            // Adjacent literals concatenate
            const first = this.previous();
            let value = first.value;
            while (this.match(TokenType.StringLiteral)) {
                value += this.previous().value;
            }
            return {
                type: "StringLiteral",
                value,
                loc: this.mergeLoc(
                    this.getLoc(first),
                    this.getLoc(this.previous()),
                ),
            };
        }
        if (this.match(TokenType.True, TokenType.False, TokenType.None)) {
            const token = this.previous();
            const value =
                token.type === TokenType.True
                    ? "True"
                    : token.type === TokenType.False
                      ? "False"
                      : "None";
            return { type: "ConstantLiteral", value, loc: this.getLoc(token) };
        }
        if (this.match(TokenType.Identifier)) {
            const token = this.previous();
            return { type: "Name", id: token.value, loc: this.getLoc(token) };
        }

        if (this.match(TokenType.LParen)) {
            return this.handleLParen();
        }
        if (this.match(TokenType.LBracket)) {
            return this.listDisplay();
        }
        if (this.match(TokenType.LBrace)) {
            return this.braceDisplay();
        }

        throw this.error(
            this.peek(),
            `Expected expression, found "${this.peek().value || this.peek().type}"`,
        );
    }

    private handleLParen(): Expression {
        // ( ) | ( expr ) | ( expr, ... ) | ( expr for ... )
        const startParen = this.previous();

        if (this.match(TokenType.RParen)) {
            return {
                type: "Tuple",
                elements: [],
                loc: this.mergeLoc(
                    this.getLoc(startParen),
                    this.getLoc(this.previous()),
                ),
            };
        }

        const first = this.starOrTest();

        if (this.check(TokenType.For)) {
            const generator = this.comprehension(
                "generator",
                first,
                this.getLoc(startParen),
            );
            this.consume(TokenType.RParen, "Expected ')'");
            return generator;
        }

        if (!this.check(TokenType.Comma)) {
            this.consume(TokenType.RParen, "Expected ')'");
            return first;
        }

        const elements = [first];
        while (this.match(TokenType.Comma)) {
            if (this.check(TokenType.RParen)) break;
            elements.push(this.starOrTest());
        }
        const endParen = this.consume(TokenType.RParen, "Expected ')'");

        return {
            type: "Tuple",
            elements,
            loc: this.mergeLoc(this.getLoc(startParen), this.getLoc(endParen)),
        };
    }

    private listDisplay(): Expression {
        const startToken = this.previous();
        const elements: Expression[] = [];

        if (!this.check(TokenType.RBracket)) {
            const first = this.starOrTest();
            if (this.check(TokenType.For)) {
                const comp = this.comprehension(
                    "list",
                    first,
                    this.getLoc(startToken),
                );
                this.consume(TokenType.RBracket, "Expected ']'");
                return comp;
            }

            elements.push(first);
            while (this.match(TokenType.Comma)) {
                if (this.check(TokenType.RBracket)) break;
                elements.push(this.starOrTest());
            }
        }

        const endToken = this.consume(TokenType.RBracket, "Expected ']'");
        return {
            type: "List",
            elements,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    private braceDisplay(): Expression {
        const startToken = this.previous();

        if (this.check(TokenType.RBrace)) {
            const endToken = this.advance();
            return {
                type: "Dict",
                entries: [],
                loc: this.mergeLoc(
                    this.getLoc(startToken),
                    this.getLoc(endToken),
                ),
            };
        }

        if (this.check(TokenType.DoubleStar)) {
            return this.dictDisplay(startToken, []);
        }

        const first = this.starOrTest();

        if (this.match(TokenType.Colon)) {
            const value = this.test();
            if (this.check(TokenType.For)) {
                const comp = this.comprehension(
                    "dict",
                    first,
                    this.getLoc(startToken),
                    value,
                );
                this.consume(TokenType.RBrace, "Expected '}'");
                return comp;
            }
            return this.dictDisplay(startToken, [{ key: first, value }]);
        }

        if (this.check(TokenType.For)) {
            const comp = this.comprehension(
                "set",
                first,
                this.getLoc(startToken),
            );
            this.consume(TokenType.RBrace, "Expected '}'");
            return comp;
        }

        const elements = [first];
        while (this.match(TokenType.Comma)) {
            if (this.check(TokenType.RBrace)) break;
            elements.push(this.starOrTest());
        }
        const endToken = this.consume(TokenType.RBrace, "Expected '}'");

        return {
            type: "Set",
            elements,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    /**
     * Remaining `key: value` and `**mapping` entries of a dict display.
     * The separator after the entries in `entries` is not yet consumed.
     */
    private dictDisplay(startToken: Token, entries: DictEntry[]): Expression {
        if (entries.length === 0 || this.match(TokenType.Comma)) {
            while (!this.check(TokenType.RBrace)) {
                if (this.match(TokenType.DoubleStar)) {
                    entries.push({ value: this.bitOr() });
                } else {
                    const key = this.test();
                    this.consume(TokenType.Colon, "Expected ':' in dict");
                    entries.push({ key, value: this.test() });
                }
                if (!this.match(TokenType.Comma)) break;
            }
        }

        const endToken = this.consume(TokenType.RBrace, "Expected '}'");
        return {
            type: "Dict",
            entries,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    private comprehension(
        form: ComprehensionExpression["form"],
        element: Expression,
        start: SourceLocation,
        value?: Expression,
    ): ComprehensionExpression {
        const clauses: ComprehensionClause[] = [];

        while (this.match(TokenType.For)) {
            const target = this.targetList();
            this.consume(TokenType.In, "Expected 'in' in comprehension");
            const iterable = this.orTest();
            clauses.push({ kind: "for", target, iterable });

            while (this.match(TokenType.If)) {
                clauses.push({ kind: "if", condition: this.orTest() });
            }
        }

        return {
            type: "Comprehension",
            form,
            element,
            value,
            clauses,
            loc: this.mergeLoc(start, this.getLoc(this.previous())),
        };
    }

    private startsExpression(): boolean {
        return this.check(...EXPRESSION_START);
    }

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private consume(type: TokenType, message: string): Token {
        if (this.check(type)) return this.advance();
        throw this.error(this.peek(), message);
    }

    private check(...types: TokenType[]): boolean {
        if (this.isAtEnd()) return false;
        const currentType = this.peek().type;
        return types.includes(currentType);
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().type === TokenType.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private peekNext(): Token {
        if (this.current + 1 >= this.tokens.length)
            return this.tokens[this.tokens.length - 1]; // EOF
        return this.tokens[this.current + 1];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    private error(token: Token, message: string): StarcheckError {
        return new StarcheckError(message, this.getLoc(token), this.source);
    }
}
