export { Lexer } from "./lexer/Lexer";
export { Parser } from "./parser/Parser";
export { TokenType } from "./lexer/TokenType";
export type { Token } from "./lexer/Token";
export * from "./parser/types";
export * from "./parser/statements";
export * from "./parser/expressions";

export * from "./scanner/ScopeStack";
export { Walker, assignedNames } from "./scanner/Walker";
export * from "./scanner/ImportScanner";
export * from "./scanner/FunctionScanner";
export * from "./scanner/signature";
export { checkCall } from "./scanner/callCompat";
export { judgeVisibility } from "./scanner/visibility";
export type { Violation } from "./scanner/Violation";

export * from "./orchestrator/Config";
export * from "./orchestrator/SharedState";
export {
    analyzeFile,
    analyzeFiles,
    buildModuleMap,
    parseSource,
} from "./orchestrator/Orchestrator";

export { StarcheckError, describeError } from "./utils/Error";
export {
    createLogger,
    setLogLevel,
    setVerbose,
} from "./utils/log";
export type { LogLevel, Logger } from "./utils/log";
