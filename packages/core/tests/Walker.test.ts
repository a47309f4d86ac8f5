import { parseSource } from "../src/orchestrator/Orchestrator";
import { NameExpression } from "../src/parser/expressions";
import { Walker, assignedNames } from "../src/scanner/Walker";
import { parseStatements } from "./helpers";

class Recorder extends Walker {
    public readonly seen: string[] = [];

    protected visitName(expr: NameExpression): void {
        if (expr.id === "boom") throw new Error("boom");
        this.seen.push(`${expr.id}:${this.isDefined(expr.id)}@${this.scope.depth}`);
    }

    public valueOf(name: string) {
        return this.scope.valueOf(name);
    }

    public get depth(): number {
        return this.scope.depth;
    }
}

function walk(source: string): Recorder {
    const recorder = new Recorder();
    recorder.walk(parseSource(source));
    return recorder;
}

describe("Walker", () => {
    test("collect the names a body assigns", () => {
        const names = assignedNames(
            parseStatements(
                "def f():\n    inner = 1\na, [b, *c] = x\nd += 1\nfor e in y:\n    g = 1\nif z:\n    h = 2\nobj.attr = 3\n",
            ),
        );
        expect([...names]).toEqual(["f", "a", "b", "c", "d", "e", "g", "h"]);
    });

    test("see module names assigned after a function", () => {
        expect(walk("def f():\n    return later\nlater = 1\n").seen).toEqual([
            "later:true@2",
        ]);
    });

    test("bind module names in statement order", () => {
        expect(walk("a\na = 1\na\nif c:\n    b\nb = 2\n").seen).toEqual([
            "a:false@1",
            "a:true@1",
            "c:false@1",
            "b:false@2",
        ]);
    });

    test("bind parameters inside the function only", () => {
        expect(walk("def f(a, b = default):\n    a\na\n").seen).toEqual([
            "default:false@1",
            "a:true@2",
            "a:false@1",
        ]);
    });

    test("bind comprehension targets inside the comprehension", () => {
        expect(walk("[x for x in y]\nx\n").seen).toEqual([
            "y:false@1",
            "x:true@2",
            "x:false@1",
        ]);
    });

    test("bind lambda parameters", () => {
        expect(walk("lambda x: x + y\n").seen).toEqual([
            "x:true@2",
            "y:false@2",
        ]);
    });

    test("give each if branch its own frame", () => {
        expect(walk("if c:\n    a\nelse:\n    b\n").seen).toEqual([
            "c:false@1",
            "a:false@2",
            "b:false@2",
        ]);
    });

    test("keep names a statement's blocks assign bound after it", () => {
        expect(
            walk("if c:\n    x = 1\nelse:\n    x = 2\nx\nfor i in items:\n    pass\ni\n").seen,
        ).toEqual(["c:false@1", "x:true@1", "items:false@1", "i:true@1"]);
    });

    test("bind loop targets in the loop frame", () => {
        expect(walk("for i in items:\n    i\n").seen).toEqual([
            "items:false@1",
            "i:true@2",
        ]);
    });

    test("pair destructured names with literal elements", () => {
        const recorder = walk("a, b = x, y\nc, d = pair\ne = f(1)\n");
        expect(recorder.valueOf("a")).toEqual({ kind: "NameAlias", name: "x" });
        expect(recorder.valueOf("b")).toEqual({ kind: "NameAlias", name: "y" });

        const c = recorder.valueOf("c");
        expect(c?.kind).toBe("PositionalElement");
        if (c?.kind === "PositionalElement") {
            expect(c.index).toBe(0);
            expect(c.source.type).toBe("Name");
        }
        expect(recorder.valueOf("d")).toMatchObject({
            kind: "PositionalElement",
            index: 1,
        });
        expect(recorder.valueOf("e")?.kind).toBe("RawExpression");
    });

    test("pop frames when a visit throws", () => {
        const recorder = new Recorder();
        expect(() =>
            recorder.walk(parseSource("def f():\n    [boom for boom in x]\n")),
        ).toThrow("boom");
        expect(recorder.depth).toBe(1);
    });
});
