import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { ALL_CHECKS, nodeHost, resolveOptions } from "../src/orchestrator/Config";
import { analyzeFiles } from "../src/orchestrator/Orchestrator";
import { setLogLevel } from "../src/utils/log";

describe("nodeHost", () => {
    let dir: string;

    beforeAll(() => setLogLevel("silent"));
    afterAll(() => setLogLevel("warn"));

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "starcheck-host-"));
        fs.writeFileSync(path.join(dir, "lib.star"), "");
        fs.mkdirSync(path.join(dir, "sub"));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test("accept regular files only", () => {
        expect(nodeHost.fileExists(path.join(dir, "lib.star"))).toBe(true);
        expect(nodeHost.fileExists(path.join(dir, "sub"))).toBe(false);
        expect(nodeHost.fileExists(path.join(dir, "missing.star"))).toBe(false);
    });

    test("treat a path through a regular file as missing", () => {
        expect(
            nodeHost.fileExists(path.join(dir, "lib.star", "sub.star")),
        ).toBe(false);
    });

    test("keep the rest of a file's report when an import runs through a file", () => {
        const main = path.join(dir, "main.star");
        fs.writeFileSync(
            main,
            'mod = import_module("./lib.star/sub.star")\ndef g():\n    pass\n',
        );

        const results = analyzeFiles(
            [path.join(dir, "lib.star"), main],
            ALL_CHECKS,
            dir,
        );

        expect(results.get(main)?.map((v) => `${v.line}: ${v.message}`)).toEqual([
            `1: Imported module './lib.star/sub.star' does not exist at resolved path '${path.join(dir, "lib.star", "sub.star")}'`,
            "1: Global variable 'mod' contains the result of `import_module` and should be private",
            "2: Function 'g' is not documented and not used in other modules, consider making it private",
        ]);
    });

    test("default to the file system host", () => {
        expect(resolveOptions().host).toBe(nodeHost);
        expect(resolveOptions().checkFileExists).toBe(true);
    });
});
