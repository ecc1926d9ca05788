import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "bucketprune");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.json");

/** Environment variable that overrides the config file location. */
export const CONFIG_PATH_ENV = "BUCKETPRUNE_CONFIG";
