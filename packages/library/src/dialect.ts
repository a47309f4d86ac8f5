import catalog from "./builtins.json";
import { BuiltinCatalog, DialectDefinition } from "./types";

export const DIALECT: Readonly<DialectDefinition> = {
    extension: ".star",
    importPrimitive: "import_module",
    privacyMarker: "_",
    testMarker: "test_",
    workspaceMarker: "kurtosis.yml",
};

const builtins: BuiltinCatalog = catalog;
const builtinFunctions = new Set(builtins.functions);
const builtinModules = new Set(builtins.modules);

// host.tld/org/repo[/...]; the host segment must contain a dot
const EXTERNAL_PATH = /^[A-Za-z0-9-]+(\.[A-Za-z0-9-]+)+\/[^/]+\/[^/]+(\/|$)/;

export function isBuiltinFunction(name: string): boolean {
    return builtinFunctions.has(name);
}

export function isBuiltinModule(name: string): boolean {
    return builtinModules.has(name);
}

export function isExternalPath(modulePath: string): boolean {
    return EXTERNAL_PATH.test(modulePath);
}

/**
 * Returns the `host/org/repo` prefix of an external module path, or
 * `undefined` when the path is not external.
 */
export function externalPackageId(modulePath: string): string | undefined {
    if (!isExternalPath(modulePath)) return undefined;
    return modulePath.split("/").slice(0, 3).join("/");
}

export function isPrivateName(name: string): boolean {
    return name.startsWith(DIALECT.privacyMarker);
}

export function isTestName(name: string): boolean {
    return name.startsWith(DIALECT.testMarker);
}

/**
 * Appends the dialect extension unless the path already ends with it.
 */
export function withDialectExtension(modulePath: string): string {
    return modulePath.endsWith(DIALECT.extension)
        ? modulePath
        : modulePath + DIALECT.extension;
}
