export interface DialectDefinition {
    /** File extension of dialect sources, dot included. */
    extension: string;
    /** Name of the builtin that loads another file as a module. */
    importPrimitive: string;
    privacyMarker: string;
    testMarker: string;
    /** File whose presence marks the root of a workspace. */
    workspaceMarker: string;
}

export interface BuiltinCatalog {
    functions: string[];
    modules: string[];
}
