/**
 * CHANGE: Centralized re-exports of the Node built-ins used by the shell
 * WHY: One import point for child_process/fs/path/readline keeps shell modules uniform
 *
 * Invariant: re-export compatible objects/functions, avoiding `export *` for modules with `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export { execFile } from "node:child_process";
export { createInterface } from "node:readline";
export { promisify } from "node:util";

// CHANGE: Re-export through constants instead of `export *`
// WHY: node:path (and often node:fs) use `export =`, incompatible with `export *`
// REF: TypeScript limitation for `export =`
export const fs = fsNS;
export const path = pathNS;
