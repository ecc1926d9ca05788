export {
  DEFAULT_CONFIG_DIR,
  DEFAULT_CONFIG_PATH,
  CONFIG_PATH_ENV,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export {
  expandHomePath,
  resolveConfigPath,
  resolveTargetPath,
} from "./paths.js";
