import { CallExpression } from "../parser/expressions";
import { FunctionSignature } from "./signature";

/**
 * Checks how a call binds against `signature` and returns one message
 * per problem. `label` names the callee in the messages.
 *
 * A `*args` argument may fill any number of positional slots, so the
 * positional counts are not checked; a `**kwargs` argument may supply
 * any parameter by name, so nothing is reported missing.
 */
export function checkCall(
    call: CallExpression,
    signature: FunctionSignature,
    label: string,
): string[] {
    const messages: string[] = [];

    const positionalCount = call.arguments.filter(
        (arg) => arg.type !== "Starred",
    ).length;
    const hasStarArgs = positionalCount !== call.arguments.length;
    const hasStarKwargs = call.keywords.some((kw) => kw.name === undefined);
    const keywordNames: string[] = [];
    for (const kw of call.keywords) {
        if (kw.name !== undefined) keywordNames.push(kw.name);
    }

    const declared = signature.positional.length;
    const required = declared - signature.defaults.length;

    if (!hasStarArgs && positionalCount > declared && !signature.vararg) {
        // Surplus arguments may stand in for keyword-only parameters
        const extra = positionalCount - declared;
        if (extra > signature.kwonly.length) {
            messages.push(
                `Too many positional arguments in call to '${label}'`,
            );
        }
    }

    if (!hasStarArgs && !hasStarKwargs) {
        const requiredNames = signature.positional.slice(0, required);
        const provided =
            positionalCount +
            keywordNames.filter((name) => requiredNames.includes(name)).length;

        if (provided < required) {
            const missing = signature.positional
                .slice(positionalCount, required)
                .filter((name) => !keywordNames.includes(name));

            if (missing.length > 0) {
                const plural = missing.length > 1 ? "s" : "";
                const names = missing.map((name) => `'${name}'`).join(", ");
                messages.push(
                    `Missing required positional argument${plural} ${names} in call to '${label}'`,
                );
            }
        }
    }

    if (!signature.kwarg) {
        const accepted = new Set([
            ...signature.positional,
            ...signature.kwonly.map((p) => p.name),
        ]);
        for (const name of keywordNames) {
            if (!accepted.has(name)) {
                messages.push(
                    `Invalid keyword argument '${name}' in call to '${label}'`,
                );
            }
        }
    }

    if (!hasStarKwargs) {
        for (const param of signature.kwonly) {
            if (!param.hasDefault && !keywordNames.includes(param.name)) {
                messages.push(
                    `Missing required keyword-only argument '${param.name}' in call to '${label}'`,
                );
            }
        }
    }

    return messages;
}
