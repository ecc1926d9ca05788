export { ageInDays, bucketFor, bucketLowerBound, MS_PER_DAY } from "./buckets.js";
export {
  deleteFiles,
  type DeleteFilesOptions,
  type DeletionReport,
  type RemoveFile,
} from "./deleter.js";
export {
  groupDirectory,
  comparePaths,
  groupTree,
  listDirectories,
  type BucketMap,
  type FileRecord,
  type GroupingResult,
  type GroupOptions,
  type GroupTreeOptions,
} from "./grouper.js";
export {
  DELETE_MARKER,
  TIMESTAMP_FORMAT,
  formatRecord,
  formatTimestamp,
  renderSelection,
  type RenderOptions,
} from "./render.js";
export { quietReporter, type Reporter } from "./reporter.js";
export {
  compareRecords,
  selectRetention,
  type BucketSelection,
  type SelectOptions,
  type SelectionResult,
} from "./selector.js";
export {
  parseSortMode,
  selectTimestamp,
  sortModeLabel,
  type FileTimes,
  type ParsedSortMode,
} from "./time.js";
