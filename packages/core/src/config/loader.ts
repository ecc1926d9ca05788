import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError, errnoCode } from "../errors/catalog.js";
import {
  PruneConfigSchema,
  type PruneConfig,
} from "../schemas/prune-config.js";
import { resolveConfigPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads config.json. A missing file means "all defaults"; a malformed one is
 * a ConfigurationError so the run stops before touching the target tree.
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<PruneConfig> {
  const configPath = resolveConfigPath(options?.configPath, options?.env);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (errnoCode(err) !== "ENOENT") {
      throw err;
    }
  }

  let parsed: unknown = {};
  if (raw !== undefined) {
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      throw new ConfigurationError(
        `Config file ${configPath} is not valid JSON`,
        { configPath, reason: err instanceof Error ? err.message : String(err) },
      );
    }
  }

  const result = PruneConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config file ${configPath}:\n${z.prettifyError(result.error)}`,
      { configPath, issues: result.error.issues },
    );
  }
  return result.data;
}
