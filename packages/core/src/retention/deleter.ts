import { unlink } from "node:fs/promises";
import {
  describeCause,
  errnoCode,
  type DeletionFailure,
} from "../errors/catalog.js";
import type { Logger } from "../logger/index.js";
import type { Reporter } from "./reporter.js";

export type RemoveFile = (path: string) => Promise<void>;

export interface DeleteFilesOptions {
  reporter: Reporter;
  /** Defaults to `fs.promises.unlink`. */
  remove?: RemoveFile;
  logger?: Logger;
}

export interface DeletionReport {
  deleted: string[];
  failures: DeletionFailure[];
}

/**
 * Removes every path in order. A failed removal is reported and recorded,
 * then the batch moves on; the promise only rejects if the reporter throws.
 */
export async function deleteFiles(
  paths: readonly string[],
  options: DeleteFilesOptions,
): Promise<DeletionReport> {
  const { reporter, logger } = options;
  const remove = options.remove ?? unlink;
  const report: DeletionReport = { deleted: [], failures: [] };

  reporter.info("");
  reporter.info("Deleting files...");

  for (const path of paths) {
    try {
      await remove(path);
    } catch (err: unknown) {
      const failure: DeletionFailure = {
        path,
        message: describeCause(err),
        ...(errnoCode(err) !== undefined && { code: errnoCode(err) }),
      };
      report.failures.push(failure);
      reporter.error(`Error during deletion ${path}: ${failure.message}`);
      logger?.debug({ err, path }, "File removal failed");
      continue;
    }
    report.deleted.push(path);
    reporter.info(`File deleted: ${path}`);
  }

  logger?.debug(
    { deleted: report.deleted.length, failed: report.failures.length },
    "Deletion batch finished",
  );
  return report;
}
