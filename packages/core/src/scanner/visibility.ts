import { isPrivateName, isTestName } from "@starcheck/library";
import { ReferenceSet } from "../orchestrator/SharedState";
import { FunctionSummary } from "./signature";
import { Violation } from "./Violation";

/**
 * Public functions must either be documented or be private. Which
 * message applies depends on whether another file references them.
 */
export function judgeVisibility(
    file: string,
    functions: FunctionSummary[],
    references: ReferenceSet,
): Violation[] {
    const violations: Violation[] = [];

    for (const fn of functions) {
        if (isTestName(fn.name) || isPrivateName(fn.name)) continue;
        if (fn.documented) continue;

        const message = references.has(file, fn.name)
            ? `Public function '${fn.name}' is used in other modules and should be documented`
            : `Function '${fn.name}' is not documented and not used in other modules, consider making it private`;

        violations.push({ file, line: fn.line, message });
    }

    return violations;
}
