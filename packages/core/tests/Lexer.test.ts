import { Lexer } from "../src/lexer/Lexer";
import { TokenType } from "../src/lexer/TokenType";

describe("Lexer", () => {
    function types(input: string) {
        return new Lexer(input).tokenize().map((t) => t.type);
    }

    test("tokenize a simple assignment", () => {
        expect(types("x = 1\n")).toEqual([
            TokenType.Identifier,
            TokenType.Equals,
            TokenType.NumberLiteral,
            TokenType.Newline,
            TokenType.EOF,
        ]);
    });

    test("emit indent and dedent around a block", () => {
        expect(types("def f():\n    pass\nx\n")).toEqual([
            TokenType.Def,
            TokenType.Identifier,
            TokenType.LParen,
            TokenType.RParen,
            TokenType.Colon,
            TokenType.Newline,
            TokenType.Indent,
            TokenType.Pass,
            TokenType.Newline,
            TokenType.Dedent,
            TokenType.Identifier,
            TokenType.Newline,
            TokenType.EOF,
        ]);
    });

    test("close open blocks at end of input", () => {
        expect(types("if a:\n    b")).toEqual([
            TokenType.If,
            TokenType.Identifier,
            TokenType.Colon,
            TokenType.Newline,
            TokenType.Indent,
            TokenType.Identifier,
            TokenType.Newline,
            TokenType.Dedent,
            TokenType.EOF,
        ]);
    });

    test("ignore newlines inside brackets", () => {
        expect(types("f(1,\n  2)\n")).toEqual([
            TokenType.Identifier,
            TokenType.LParen,
            TokenType.NumberLiteral,
            TokenType.Comma,
            TokenType.NumberLiteral,
            TokenType.RParen,
            TokenType.Newline,
            TokenType.EOF,
        ]);
    });

    test("skip comments and blank lines", () => {
        expect(types("x = 1  # note\n\n# only a comment\ny = 2\n")).toEqual([
            TokenType.Identifier,
            TokenType.Equals,
            TokenType.NumberLiteral,
            TokenType.Newline,
            TokenType.Identifier,
            TokenType.Equals,
            TokenType.NumberLiteral,
            TokenType.Newline,
            TokenType.EOF,
        ]);
    });

    test("join lines ending in a backslash", () => {
        expect(types("x = 1 + \\\n    2\n")).toEqual([
            TokenType.Identifier,
            TokenType.Equals,
            TokenType.NumberLiteral,
            TokenType.Plus,
            TokenType.NumberLiteral,
            TokenType.Newline,
            TokenType.EOF,
        ]);
    });

    test("prefer the longest operator", () => {
        const tokens = new Lexer("a **= b // c\n").tokenize();
        expect(tokens[1].type).toBe(TokenType.AugAssign);
        expect(tokens[1].value).toBe("**=");
        expect(tokens[3].type).toBe(TokenType.DoubleSlash);
    });

    test("read string escapes", () => {
        const [token] = new Lexer('"a\\nb\\q"').tokenize();
        expect(token.type).toBe(TokenType.StringLiteral);
        expect(token.value).toBe("a\nb\\q");
    });

    test("keep backslashes in raw strings", () => {
        const [token] = new Lexer('r"a\\nb"').tokenize();
        expect(token.value).toBe("a\\nb");
    });

    test("read triple-quoted strings across lines", () => {
        const tokens = new Lexer('"""first\nsecond"""\nx\n').tokenize();
        expect(tokens[0].value).toBe("first\nsecond");
        expect(tokens[2].type).toBe(TokenType.Identifier);
        expect(tokens[2].line).toBe(3);
    });

    test("read number forms", () => {
        const values = new Lexer("0x1F 1_000 1.5e-3 .5")
            .tokenize()
            .filter((t) => t.type === TokenType.NumberLiteral)
            .map((t) => t.value);
        expect(values).toEqual(["0x1F", "1_000", "1.5e-3", ".5"]);
    });

    test("track lines and columns", () => {
        const tokens = new Lexer("a = 1\nbb = 2\n").tokenize();
        const bb = tokens.find((t) => t.value === "bb");
        expect(bb?.line).toBe(2);
        expect(bb?.col).toBe(1);
    });

    test("throw on unclosed string", () => {
        expect(() => new Lexer('print("Hello World)').tokenize()).toThrow(
            "Unterminated string",
        );
    });

    test("throw on inconsistent dedent", () => {
        expect(() => new Lexer("if x:\n    a\n  b\n").tokenize()).toThrow(
            "Unindent does not match any outer indentation level",
        );
    });

    test("throw on unexpected character", () => {
        expect(() => new Lexer("a = $\n").tokenize()).toThrow(
            "Unexpected character '$'",
        );
    });
});
