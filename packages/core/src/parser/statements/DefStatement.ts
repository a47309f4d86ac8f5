import { BaseStatement } from "./BaseStatement";
import { ParameterList, SourceLocation } from "../types";
import { Statement } from "./index";

export class DefStatement implements BaseStatement {
    kind = "DefStatement" as const;

    constructor(
        public name: string,
        public params: ParameterList,
        public body: Statement[],
        public loc: SourceLocation,
    ) {}
}
