export enum TokenType {
    // Keywords
    Def = "Def",
    If = "If",
    Elif = "Elif",
    Else = "Else",
    For = "For",
    While = "While",
    In = "In",
    Return = "Return",
    Pass = "Pass",
    Break = "Break",
    Continue = "Continue",
    Lambda = "Lambda",
    And = "And",
    Or = "Or",
    Not = "Not",
    Is = "Is",
    True = "True",
    False = "False",
    None = "None",

    // Identifiers
    Identifier = "Identifier",

    // Brackets & punctuation
    LParen = "LParen", // (
    RParen = "RParen", // )
    LBracket = "LBracket", // [
    RBracket = "RBracket", // ]
    LBrace = "LBrace", // {
    RBrace = "RBrace", // }
    Comma = "Comma", // ,
    Colon = "Colon", // :
    Semicolon = "Semicolon", // ;
    Dot = "Dot", // .
    Arrow = "Arrow", // ->
    At = "At", // @

    // Assignment
    Equals = "Equals", // =
    AugAssign = "AugAssign", // += -= *= /= //= %= **= &= |= ^= <<= >>=

    // Operators
    Plus = "Plus", // +
    Minus = "Minus", // -
    Star = "Star", // *
    DoubleStar = "DoubleStar", // **
    Slash = "Slash", // /
    DoubleSlash = "DoubleSlash", // //
    Percent = "Percent", // %
    Tilde = "Tilde", // ~
    Ampersand = "Ampersand", // &
    Pipe = "Pipe", // |
    Caret = "Caret", // ^
    ShiftLeft = "ShiftLeft", // <<
    ShiftRight = "ShiftRight", // >>

    // Comparison
    EqualEqual = "EqualEqual", // ==
    NotEqual = "NotEqual", // !=
    Less = "Less", // <
    Greater = "Greater", // >
    LessEqual = "LessEqual", // <=
    GreaterEqual = "GreaterEqual", // >=

    // Literals
    StringLiteral = "StringLiteral",
    NumberLiteral = "NumberLiteral",

    // Layout
    Newline = "Newline",
    Indent = "Indent",
    Dedent = "Dedent",

    EOF = "EOF",
}
