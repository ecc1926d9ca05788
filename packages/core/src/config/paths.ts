import { homedir } from "node:os";
import { resolve } from "node:path";
import { CONFIG_PATH_ENV, DEFAULT_CONFIG_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the directory a prune run operates on to an absolute path.
 */
export function resolveTargetPath(input: string): string {
  return resolve(expandHomePath(input));
}

/**
 * Picks the config file: explicit flag, then $BUCKETPRUNE_CONFIG, then the default.
 */
export function resolveConfigPath(
  input?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const candidate = input ?? env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_PATH;
  return resolve(expandHomePath(candidate));
}
