import * as fs from "fs/promises";
import yaml from "js-yaml";
import { CheckConfig } from "@starcheck/core";

export const CONFIG_FILE_NAME = "starcheck.yml";

export interface FileConfig {
    checks: Partial<CheckConfig>;
    checkFileExists?: boolean;
    verbose?: boolean;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

const CHECK_KEYS: Record<string, keyof CheckConfig> = {
    import_naming: "importNaming",
    calls: "calls",
    function_visibility: "functionVisibility",
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBoolean(
    record: Record<string, unknown>,
    key: string,
    source: string,
): boolean | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "boolean") {
        throw new ConfigError(`${source}: '${key}' must be true or false`);
    }
    return value;
}

/**
 * Parses the YAML text of a configuration file. An empty document is
 * an empty configuration.
 */
export function parseConfig(text: string, source: string): FileConfig {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`${source}: invalid YAML: ${reason}`);
    }

    const config: FileConfig = { checks: {} };
    if (raw === undefined || raw === null) return config;
    if (!isRecord(raw)) {
        throw new ConfigError(`${source}: expected a mapping at the top level`);
    }

    const checks = raw.checks;
    if (checks !== undefined && checks !== null) {
        if (!isRecord(checks)) {
            throw new ConfigError(`${source}: 'checks' must be a mapping`);
        }
        for (const key of Object.keys(checks)) {
            const field = CHECK_KEYS[key];
            if (!field) {
                throw new ConfigError(`${source}: unknown check '${key}'`);
            }
            config.checks[field] = readBoolean(checks, key, source);
        }
    }

    config.checkFileExists = readBoolean(raw, "check_file_exists", source);
    config.verbose = readBoolean(raw, "verbose", source);
    return config;
}

function isNotFound(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Loads `file`. A missing file is an empty configuration unless
 * `required` is set.
 */
export async function loadConfig(
    file: string,
    required: boolean,
): Promise<FileConfig> {
    let text: string;
    try {
        text = await fs.readFile(file, "utf-8");
    } catch (e) {
        if (isNotFound(e)) {
            if (required) throw new ConfigError(`Config file not found: ${file}`);
            return { checks: {} };
        }
        throw e;
    }
    return parseConfig(text, file);
}
