import { ScopeStack, UNKNOWN, symbolicValueOf } from "../src/scanner/ScopeStack";
import { parseExpression } from "./helpers";

describe("ScopeStack", () => {
    test("start with the global frame", () => {
        const scope = new ScopeStack();
        expect(scope.depth).toBe(1);
        expect(scope.isGlobal()).toBe(true);
    });

    test("forget names of a popped frame", () => {
        const scope = new ScopeStack();
        scope.bind("outer");
        scope.enter();
        scope.bind("inner");
        expect(scope.isGlobal()).toBe(false);
        expect(scope.isBound("outer")).toBe(true);
        expect(scope.isBound("inner")).toBe(true);

        scope.exit();
        expect(scope.isBound("inner")).toBe(false);
        expect(scope.isBound("outer")).toBe(true);
    });

    test("return the innermost value", () => {
        const scope = new ScopeStack();
        scope.bindValue("a", { kind: "NameAlias", name: "x" });
        scope.enter();
        scope.bindValue("a", UNKNOWN);
        expect(scope.valueOf("a")).toEqual({ kind: "Unknown" });

        scope.exit();
        expect(scope.valueOf("a")).toEqual({ kind: "NameAlias", name: "x" });
        expect(scope.valueOf("b")).toBeUndefined();
    });

    test("treat operations on an empty stack as no-ops", () => {
        const scope = new ScopeStack();
        scope.exit();
        scope.exit();
        expect(scope.depth).toBe(0);

        scope.bind("a");
        scope.bindValue("b", UNKNOWN);
        expect(scope.isBound("a")).toBe(false);
        expect(scope.valueOf("b")).toBeUndefined();
    });

    test("describe assigned expressions", () => {
        expect(symbolicValueOf(parseExpression("other\n"))).toEqual({
            kind: "NameAlias",
            name: "other",
        });
        expect(symbolicValueOf(parseExpression("f(1)\n")).kind).toBe(
            "RawExpression",
        );
    });
});
