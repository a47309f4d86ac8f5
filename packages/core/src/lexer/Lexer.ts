import { Token } from "./Token";
import { TokenType } from "./TokenType";
import { StarcheckError } from "../utils/Error";

const KEYWORDS: Record<string, TokenType> = {
    def: TokenType.Def,
    if: TokenType.If,
    elif: TokenType.Elif,
    else: TokenType.Else,
    for: TokenType.For,
    while: TokenType.While,
    in: TokenType.In,
    return: TokenType.Return,
    pass: TokenType.Pass,
    break: TokenType.Break,
    continue: TokenType.Continue,
    lambda: TokenType.Lambda,
    and: TokenType.And,
    or: TokenType.Or,
    not: TokenType.Not,
    is: TokenType.Is,
    True: TokenType.True,
    False: TokenType.False,
    None: TokenType.None,
};

// Longest spellings first so that "**=" wins over "**" and "*".
const OPERATORS: [string, TokenType][] = [
    ["**=", TokenType.AugAssign],
    ["//=", TokenType.AugAssign],
    ["<<=", TokenType.AugAssign],
    [">>=", TokenType.AugAssign],
    ["**", TokenType.DoubleStar],
    ["//", TokenType.DoubleSlash],
    ["<<", TokenType.ShiftLeft],
    [">>", TokenType.ShiftRight],
    ["<=", TokenType.LessEqual],
    [">=", TokenType.GreaterEqual],
    ["==", TokenType.EqualEqual],
    ["!=", TokenType.NotEqual],
    ["->", TokenType.Arrow],
    ["+=", TokenType.AugAssign],
    ["-=", TokenType.AugAssign],
    ["*=", TokenType.AugAssign],
    ["/=", TokenType.AugAssign],
    ["%=", TokenType.AugAssign],
    ["&=", TokenType.AugAssign],
    ["|=", TokenType.AugAssign],
    ["^=", TokenType.AugAssign],
    ["+", TokenType.Plus],
    ["-", TokenType.Minus],
    ["*", TokenType.Star],
    ["/", TokenType.Slash],
    ["%", TokenType.Percent],
    ["~", TokenType.Tilde],
    ["&", TokenType.Ampersand],
    ["|", TokenType.Pipe],
    ["^", TokenType.Caret],
    ["<", TokenType.Less],
    [">", TokenType.Greater],
    ["=", TokenType.Equals],
    ["(", TokenType.LParen],
    [")", TokenType.RParen],
    ["[", TokenType.LBracket],
    ["]", TokenType.RBracket],
    ["{", TokenType.LBrace],
    ["}", TokenType.RBrace],
    [",", TokenType.Comma],
    [":", TokenType.Colon],
    [";", TokenType.Semicolon],
    [".", TokenType.Dot],
    ["@", TokenType.At],
];

const OPENING = new Set(["(", "[", "{"]);
const CLOSING = new Set([")", "]", "}"]);

const ESCAPES: Record<string, string> = {
    n: "\n",
    t: "\t",
    r: "\r",
    "0": "\0",
    "\\": "\\",
    "'": "'",
    '"': '"',
};

const TAB_SIZE = 8;

export class Lexer {
    private input: string;
    private position: number = 0;
    private line: number = 1;
    private col: number = 1;

    private tokens: Token[] = [];
    private indentStack: number[] = [0];
    // Open brackets; newlines and indentation inside them are insignificant
    private depth: number = 0;
    private atLineStart: boolean = true;

    constructor(input: string) {
        this.input = input;
    }

    public tokenize(): Token[] {
        this.tokens = [];
        this.indentStack = [0];
        this.depth = 0;
        this.atLineStart = true;

        while (this.position < this.input.length) {
            if (this.atLineStart && this.depth === 0) {
                this.readIndentation();
                continue;
            }

            const char = this.currentChar();

            if (char === "\n") {
                if (this.depth === 0) this.pushNewline();
                this.advance();
                this.atLineStart = this.depth === 0;
                continue;
            }

            if (char === " " || char === "\t" || char === "\r" || char === "\f") {
                this.advance();
                continue;
            }

            if (char === "#") {
                this.skipComment();
                continue;
            }

            if (char === "\\" && this.isLineBreakAt(this.position + 1)) {
                // Explicit line continuation
                this.advance();
                if (this.currentChar() === "\r") this.advance();
                this.advance();
                continue;
            }

            const prefixLength = this.stringPrefixLength();
            if (prefixLength >= 0) {
                this.tokens.push(this.readString(prefixLength));
                continue;
            }

            if (this.isAlpha(char)) {
                this.tokens.push(this.readIdentifier());
                continue;
            }

            if (
                this.isDigit(char) ||
                (char === "." && this.isDigit(this.peekChar()))
            ) {
                this.tokens.push(this.readNumber());
                continue;
            }

            const operator = this.readOperator();
            if (operator) {
                this.tokens.push(operator);
                continue;
            }

            throw this.error(`Unexpected character '${char}'`);
        }

        this.pushNewline();
        while (this.indentStack.length > 1) {
            this.indentStack.pop();
            this.tokens.push(this.createToken(TokenType.Dedent, ""));
        }
        this.tokens.push(this.createToken(TokenType.EOF, ""));
        return this.tokens;
    }

    /**
     * Measures the indentation of a new logical line and emits Indent or
     * Dedent tokens. Blank and comment-only lines are skipped entirely.
     */
    private readIndentation() {
        let width = 0;
        while (this.position < this.input.length) {
            const char = this.currentChar();
            if (char === " ") {
                width++;
            } else if (char === "\t") {
                width = (Math.floor(width / TAB_SIZE) + 1) * TAB_SIZE;
            } else if (char === "\f") {
                width = 0;
            } else {
                break;
            }
            this.advance();
        }

        if (this.position >= this.input.length) {
            this.atLineStart = false;
            return;
        }

        const char = this.currentChar();
        if (char === "#") {
            this.skipComment();
            return;
        }
        if (char === "\n" || char === "\r") {
            this.advance();
            return;
        }

        this.atLineStart = false;
        const current = this.indentStack[this.indentStack.length - 1];

        if (width > current) {
            this.indentStack.push(width);
            this.tokens.push(this.createToken(TokenType.Indent, ""));
            return;
        }

        while (width < this.indentStack[this.indentStack.length - 1]) {
            this.indentStack.pop();
            this.tokens.push(this.createToken(TokenType.Dedent, ""));
        }

        if (width !== this.indentStack[this.indentStack.length - 1]) {
            throw this.error(
                "Unindent does not match any outer indentation level",
            );
        }
    }

    private pushNewline() {
        const last = this.tokens[this.tokens.length - 1];
        if (
            last === undefined ||
            last.type === TokenType.Newline ||
            last.type === TokenType.Indent ||
            last.type === TokenType.Dedent
        ) {
            return;
        }
        this.tokens.push(this.createToken(TokenType.Newline, ""));
    }

    private readOperator(): Token | null {
        for (const [text, type] of OPERATORS) {
            if (!this.input.startsWith(text, this.position)) continue;

            const token = this.createToken(type, text);
            for (let i = 0; i < text.length; i++) this.advance();

            if (OPENING.has(text)) this.depth++;
            if (CLOSING.has(text)) this.depth = Math.max(0, this.depth - 1);
            return token;
        }
        return null;
    }

    /**
     * Length of the string prefix (`r`, `b`, `rb`, ...) starting at the
     * current position, or -1 when no string literal starts here.
     */
    private stringPrefixLength(): number {
        let length = 0;
        while (length < 2 && /[rRbBuUfF]/.test(this.peekChar(length))) {
            length++;
        }
        const quote = this.peekChar(length);
        return quote === '"' || quote === "'" ? length : -1;
    }

    private readString(prefixLength: number): Token {
        const startLine = this.line;
        const startCol = this.col;
        const startPosition = this.position;

        const prefix = this.input.substring(
            this.position,
            this.position + prefixLength,
        );
        const raw = /[rR]/.test(prefix);
        for (let i = 0; i < prefixLength; i++) this.advance();

        const quote = this.currentChar();
        const triple =
            this.peekChar(1) === quote && this.peekChar(2) === quote;
        const delimiter = triple ? quote.repeat(3) : quote;
        for (let i = 0; i < delimiter.length; i++) this.advance();

        let value = "";
        while (true) {
            if (this.position >= this.input.length) {
                throw new StarcheckError("Unterminated string", {
                    line: startLine,
                    col: startCol,
                });
            }

            if (this.input.startsWith(delimiter, this.position)) {
                for (let i = 0; i < delimiter.length; i++) this.advance();
                break;
            }

            const char = this.currentChar();
            if (char === "\n" && !triple) {
                throw new StarcheckError("Unterminated string", {
                    line: startLine,
                    col: startCol,
                });
            }

            if (char === "\\") {
                value += this.readEscape(raw);
                continue;
            }

            value += char;
            this.advance();
        }

        return {
            type: TokenType.StringLiteral,
            value,
            line: startLine,
            col: startCol,
            length: this.position - startPosition,
        };
    }

    private readEscape(raw: boolean): string {
        this.advance(); // backslash
        if (this.position >= this.input.length) return "\\";

        const next = this.currentChar();
        this.advance();

        if (raw) return "\\" + next;
        if (next === "\n") return "";
        return ESCAPES[next] ?? "\\" + next;
    }

    private createToken(type: TokenType, value: string): Token {
        return { type, value, line: this.line, col: this.col };
    }

    private advance() {
        if (this.currentChar() === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.position++;
    }

    private currentChar(): string {
        return this.input[this.position];
    }

    private peekChar(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    private isLineBreakAt(index: number): boolean {
        const char = this.input[index];
        return (
            char === "\n" || (char === "\r" && this.input[index + 1] === "\n")
        );
    }

    private isAlpha(char: string): boolean {
        return /[a-zA-Z_]/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /[a-zA-Z0-9_]/.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }

    private readNumber(): Token {
        const startLine = this.line;
        const startCol = this.col;
        let value = "";

        const consumeWhile = (pattern: RegExp) => {
            while (
                this.position < this.input.length &&
                pattern.test(this.currentChar())
            ) {
                value += this.currentChar();
                this.advance();
            }
        };

        if (this.currentChar() === "0" && /[xXoObB]/.test(this.peekChar())) {
            value += this.currentChar();
            this.advance();
            value += this.currentChar();
            this.advance();
            consumeWhile(/[0-9a-fA-F_]/);
        } else {
            consumeWhile(/[0-9_]/);
            if (this.currentChar() === ".") {
                value += ".";
                this.advance();
                consumeWhile(/[0-9_]/);
            }
            if (/[eE]/.test(this.currentChar())) {
                const sign = /[+-]/.test(this.peekChar()) ? 1 : 0;
                if (this.isDigit(this.peekChar(1 + sign))) {
                    for (let i = 0; i <= sign; i++) {
                        value += this.currentChar();
                        this.advance();
                    }
                    consumeWhile(/[0-9_]/);
                }
            }
        }

        return {
            type: TokenType.NumberLiteral,
            value,
            line: startLine,
            col: startCol,
        };
    }

    private readIdentifier(): Token {
        const startLine = this.line;
        const startCol = this.col;
        let value = "";

        while (
            this.position < this.input.length &&
            this.isAlphaNumeric(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        const type = KEYWORDS[value] ?? TokenType.Identifier;
        return { type, value, line: startLine, col: startCol };
    }

    private skipComment() {
        while (
            this.position < this.input.length &&
            this.currentChar() !== "\n"
        ) {
            this.advance();
        }
    }

    private error(message: string): StarcheckError {
        return new StarcheckError(
            message,
            { line: this.line, col: this.col },
            this.input,
        );
    }
}
