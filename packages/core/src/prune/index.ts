export {
  CONFIRM_QUESTION,
  DELETE_ALL_WARNING,
  isAffirmative,
  runPrune,
  type Confirm,
  type PruneDependencies,
  type PruneOutcome,
  type PruneStatus,
} from "./run.js";
export {
  assertCompatibleModes,
  assertDirectory,
  validateOptions,
  type ModeFlags,
} from "./validate.js";
