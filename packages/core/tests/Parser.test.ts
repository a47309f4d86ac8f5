import {
    expressionOf,
    parseExpression,
    parseStatements,
    statementOf,
} from "./helpers";

describe("Parser", () => {
    test("parse chained assignment", () => {
        const stmt = statementOf(
            parseStatements("a = b = 1\n")[0],
            "AssignmentStatement",
        );
        expect(stmt.targets.map((t) => expressionOf(t, "Name").id)).toEqual([
            "a",
            "b",
        ]);
        expect(expressionOf(stmt.value, "NumberLiteral").raw).toBe("1");
    });

    test("parse tuple targets and values", () => {
        const stmt = statementOf(
            parseStatements("a, b = 1, 2\n")[0],
            "AssignmentStatement",
        );
        expect(expressionOf(stmt.targets[0], "Tuple").elements).toHaveLength(2);
        expect(expressionOf(stmt.value, "Tuple").elements).toHaveLength(2);
    });

    test("parse augmented assignment", () => {
        const stmt = statementOf(
            parseStatements("total += 2\n")[0],
            "AugAssignStatement",
        );
        expect(stmt.operator).toBe("+=");
        expect(expressionOf(stmt.target, "Name").id).toBe("total");
    });

    test("parse every kind of parameter", () => {
        const def = statementOf(
            parseStatements(
                "def f(a, b = 1, *args, c, d = 2, **kw):\n    pass\n",
            )[0],
            "DefStatement",
        );
        expect(def.name).toBe("f");
        expect(def.params.positional.map((p) => p.name)).toEqual(["a", "b"]);
        expect(def.params.positional[1].default?.type).toBe("NumberLiteral");
        expect(def.params.vararg).toBe("args");
        expect(def.params.kwonly.map((p) => p.name)).toEqual(["c", "d"]);
        expect(def.params.kwonly[0].default).toBeUndefined();
        expect(def.params.kwarg).toBe("kw");
        expect(def.body.map((s) => s.kind)).toEqual(["PassStatement"]);
    });

    test("parse a bare star as the start of keyword-only parameters", () => {
        const def = statementOf(
            parseStatements("def g(a, *, b):\n    pass\n")[0],
            "DefStatement",
        );
        expect(def.params.vararg).toBeUndefined();
        expect(def.params.positional.map((p) => p.name)).toEqual(["a"]);
        expect(def.params.kwonly.map((p) => p.name)).toEqual(["b"]);
    });

    test("skip annotations", () => {
        const def = statementOf(
            parseStatements("def h(a: str, b: int = 3) -> bool:\n    return a\n")[0],
            "DefStatement",
        );
        expect(def.params.positional.map((p) => p.name)).toEqual(["a", "b"]);
        expect(def.body[0].kind).toBe("ReturnStatement");
    });

    test("locate a def at its keyword", () => {
        const def = statementOf(
            parseStatements("x = 1\n\ndef run():\n    pass\n")[1],
            "DefStatement",
        );
        expect(def.loc.line).toBe(3);
        expect(def.loc.col).toBe(1);
    });

    test("nest elif chains in the else branch", () => {
        const stmt = statementOf(
            parseStatements(
                "if a:\n    x = 1\nelif b:\n    x = 2\nelse:\n    x = 3\n",
            )[0],
            "IfStatement",
        );
        expect(stmt.thenBranch).toHaveLength(1);
        const elif = statementOf(stmt.elseBranch[0], "IfStatement");
        expect(expressionOf(elif.condition, "Name").id).toBe("b");
        expect(elif.elseBranch).toHaveLength(1);
    });

    test("parse an inline suite", () => {
        const stmt = statementOf(
            parseStatements("if x: pass\ny = 1\n")[0],
            "IfStatement",
        );
        expect(stmt.thenBranch.map((s) => s.kind)).toEqual(["PassStatement"]);
        expect(parseStatements("if x: pass\ny = 1\n")).toHaveLength(2);
    });

    test("parse loops with else clauses", () => {
        const [loop, wait] = parseStatements(
            "for k, v in items:\n    pass\nelse:\n    done = True\nwhile x:\n    break\n",
        );
        const forStmt = statementOf(loop, "ForStatement");
        expect(expressionOf(forStmt.target, "Tuple").elements).toHaveLength(2);
        expect(forStmt.orelse).toHaveLength(1);

        const whileStmt = statementOf(wait, "WhileStatement");
        expect(whileStmt.body.map((s) => s.kind)).toEqual(["BreakStatement"]);
    });

    test("parse call arguments", () => {
        const call = expressionOf(
            parseExpression("f(1, *xs, k = 2, **kw)\n"),
            "Call",
        );
        expect(call.arguments.map((a) => a.type)).toEqual([
            "NumberLiteral",
            "Starred",
        ]);
        expect(call.keywords.map((k) => k.name)).toEqual(["k", undefined]);
    });

    test("locate a multi-line call at its callee", () => {
        const call = expressionOf(parseExpression("\n\nf(\n    1,\n)\n"), "Call");
        expect(call.loc.line).toBe(3);
    });

    test("parse attribute calls", () => {
        const call = expressionOf(parseExpression("mod.fn(a)\n"), "Call");
        const callee = expressionOf(call.callee, "Attribute");
        expect(expressionOf(callee.object, "Name").id).toBe("mod");
        expect(callee.attr).toBe("fn");
    });

    test("respect operator precedence", () => {
        const sum = expressionOf(parseExpression("1 + 2 * 3\n"), "BinaryExpression");
        expect(sum.operator).toBe("+");
        expect(expressionOf(sum.right, "BinaryExpression").operator).toBe("*");
    });

    test("bind not looser than membership", () => {
        const negation = expressionOf(
            parseExpression("not a in b\n"),
            "UnaryExpression",
        );
        expect(negation.operator).toBe("not");
        expect(expressionOf(negation.operand, "BinaryExpression").operator).toBe(
            "in",
        );
    });

    test("parse compound comparison operators", () => {
        const notIn = expressionOf(parseExpression("a not in b\n"), "BinaryExpression");
        expect(notIn.operator).toBe("not in");
        const isNot = expressionOf(parseExpression("a is not None\n"), "BinaryExpression");
        expect(isNot.operator).toBe("is not");
    });

    test("parse conditional expressions and lambdas", () => {
        const conditional = expressionOf(
            parseExpression("a if b else c\n"),
            "ConditionalExpression",
        );
        expect(expressionOf(conditional.test, "Name").id).toBe("b");

        const lambda = expressionOf(parseExpression("lambda x, y = 1: x\n"), "Lambda");
        expect(lambda.params.positional.map((p) => p.name)).toEqual(["x", "y"]);
    });

    test("parse comprehensions", () => {
        const list = expressionOf(
            parseExpression("[x for x in xs if x]\n"),
            "Comprehension",
        );
        expect(list.form).toBe("list");
        expect(list.clauses.map((c) => c.kind)).toEqual(["for", "if"]);

        const dict = expressionOf(
            parseExpression("{k: v for k, v in pairs}\n"),
            "Comprehension",
        );
        expect(dict.form).toBe("dict");
        expect(dict.value?.type).toBe("Name");

        const call = expressionOf(parseExpression("any(x for x in xs)\n"), "Call");
        expect(expressionOf(call.arguments[0], "Comprehension").form).toBe(
            "generator",
        );
    });

    test("parse dict and set displays", () => {
        const dict = expressionOf(parseExpression('{"a": 1, **rest}\n'), "Dict");
        expect(dict.entries).toHaveLength(2);
        expect(dict.entries[1].key).toBeUndefined();

        const set = expressionOf(parseExpression("{1, 2}\n"), "Set");
        expect(set.elements).toHaveLength(2);

        expect(expressionOf(parseExpression("{}\n"), "Dict").entries).toEqual([]);
    });

    test("parse slices", () => {
        const sub = expressionOf(parseExpression("a[1:2]\n"), "Subscript");
        const slice = expressionOf(sub.index, "Slice");
        expect(slice.lower?.type).toBe("NumberLiteral");
        expect(slice.upper?.type).toBe("NumberLiteral");
        expect(slice.step).toBeUndefined();

        const stepOnly = expressionOf(
            expressionOf(parseExpression("a[::2]\n"), "Subscript").index,
            "Slice",
        );
        expect(stepOnly.lower).toBeUndefined();
        expect(stepOnly.upper).toBeUndefined();
        expect(stepOnly.step?.type).toBe("NumberLiteral");
    });

    test("concatenate adjacent string literals", () => {
        expect(
            expressionOf(parseExpression('"a" "b"\n'), "StringLiteral").value,
        ).toBe("ab");
    });

    test("parse parenthesized forms", () => {
        expect(parseExpression("()\n").type).toBe("Tuple");
        expect(parseExpression("(a)\n").type).toBe("Name");
        expect(expressionOf(parseExpression("(a,)\n"), "Tuple").elements).toHaveLength(1);
    });

    test("accept semicolon-separated statements", () => {
        expect(
            parseStatements("a = 1; b = 2\n").map((s) => s.kind),
        ).toEqual(["AssignmentStatement", "AssignmentStatement"]);
    });

    test("throw on missing function name", () => {
        expect(() => parseStatements("def (x):\n    pass\n")).toThrow(
            "Expected function name",
        );
    });

    test("throw on missing expression", () => {
        expect(() => parseStatements("x = \n")).toThrow("Expected expression");
    });

    test("throw on trailing tokens", () => {
        expect(() => parseStatements("a b\n")).toThrow(
            'Expected end of statement, found "b"',
        );
    });
});
