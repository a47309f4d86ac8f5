import {
    externalPackageId,
    isBuiltinFunction,
    isBuiltinModule,
    isExternalPath,
    isPrivateName,
    isTestName,
    withDialectExtension,
} from "../src";

describe("Dialect", () => {
    test("builtin lookups", () => {
        expect(isBuiltinFunction("import_module")).toBe(true);
        expect(isBuiltinFunction("len")).toBe(true);
        expect(isBuiltinFunction("deploy")).toBe(false);
        expect(isBuiltinModule("json")).toBe(true);
        expect(isBuiltinModule("helpers")).toBe(false);
    });

    test("external paths need host, org and repo segments", () => {
        expect(isExternalPath("github.com/org/repo/lib.star")).toBe(true);
        expect(isExternalPath("github.com/org/repo")).toBe(true);
        expect(isExternalPath("github.com/non_existent_module")).toBe(false);
        expect(isExternalPath("config.d/lib.star")).toBe(false);
        expect(isExternalPath("v1.2/x.star")).toBe(false);
        expect(isExternalPath("./lib.star")).toBe(false);
        expect(isExternalPath("/src/lib.star")).toBe(false);
        expect(isExternalPath("src/lib.star")).toBe(false);
    });

    test("package id is the first three segments", () => {
        expect(
            externalPackageId("github.com/org/repo/src/shared/utils.star"),
        ).toBe("github.com/org/repo");
        expect(externalPackageId("github.com/org")).toBeUndefined();
        expect(externalPackageId("./lib.star")).toBeUndefined();
    });

    test("markers", () => {
        expect(isPrivateName("_helper")).toBe(true);
        expect(isPrivateName("helper")).toBe(false);
        expect(isTestName("test_deploy")).toBe(true);
        expect(isTestName("testing")).toBe(false);
    });

    test("extension is appended once", () => {
        expect(withDialectExtension("./lib")).toBe("./lib.star");
        expect(withDialectExtension("./lib.star")).toBe("./lib.star");
    });
});
