import * as fs from "fs";
import * as path from "path";
import { DIALECT } from "@starcheck/library";

/**
 * Nearest directory at or above `start` holding the workspace marker
 * file. Without one, the directory of `start` itself.
 */
export function findWorkspaceRoot(start: string): string {
    const resolved = path.resolve(start);
    const stat = fs.statSync(resolved, { throwIfNoEntry: false });
    const origin = stat?.isDirectory() ? resolved : path.dirname(resolved);

    let dir = origin;
    while (true) {
        if (fs.existsSync(path.join(dir, DIALECT.workspaceMarker))) return dir;

        const parent = path.dirname(dir);
        if (parent === dir) return origin;
        dir = parent;
    }
}
