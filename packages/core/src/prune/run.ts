import type { DeletionFailure } from "../errors/catalog.js";
import { resolveTargetPath } from "../config/paths.js";
import { PruneStateMachine } from "../lifecycle/state-machine.js";
import type { Logger } from "../logger/index.js";
import type { PruneOptionsInput } from "../schemas/prune-config.js";
import { deleteFiles, type RemoveFile } from "../retention/deleter.js";
import {
  groupDirectory,
  groupTree,
  type FileRecord,
  type GroupingResult,
} from "../retention/grouper.js";
import { renderSelection } from "../retention/render.js";
import { quietReporter, type Reporter } from "../retention/reporter.js";
import { selectRetention } from "../retention/selector.js";
import { assertDirectory, validateOptions } from "./validate.js";

export const CONFIRM_QUESTION =
  "Do you want to proceed with deletion? There is no undo. (yes/no)";
export const DELETE_ALL_WARNING =
  "WARNING! No files will be kept, you want ALL files to be deleted.";

/** Asks the operator a question and resolves with the raw answer. */
export type Confirm = (question: string) => Promise<string>;

export interface PruneDependencies {
  reporter: Reporter;
  confirm: Confirm;
  logger?: Logger;
  /** Reference time for ages. Defaults to the wall clock. */
  now?: () => Date;
  remove?: RemoveFile;
}

export type PruneStatus =
  | "deleted"
  | "dry-run"
  | "cancelled"
  | "nothing-to-delete";

export interface PruneOutcome {
  status: PruneStatus;
  /** Files retained across every directory and bucket. */
  keep: string[];
  /** Files selected for deletion. */
  delete: string[];
  /** Files actually removed; empty unless status is "deleted". */
  deleted: string[];
  failures: DeletionFailure[];
}

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === "yes";
}

/**
 * One prune run: validate, group and select, then confirm, delete or just
 * report. Configuration and path problems reject with a PruneError; per-file
 * deletion failures are part of the outcome.
 */
export async function runPrune(
  input: PruneOptionsInput,
  deps: PruneDependencies,
): Promise<PruneOutcome> {
  const { logger, confirm } = deps;
  const machine = new PruneStateMachine();
  machine.onStateChange((event) => {
    logger?.debug(
      { from: event.from, to: event.to, reason: event.reason },
      "Prune state changed",
    );
  });

  try {
    const options = validateOptions(input);
    const reporter = options.quiet ? quietReporter(deps.reporter) : deps.reporter;
    const target = resolveTargetPath(options.path);
    await assertDirectory(target);

    machine.transition("group-select");
    const now = deps.now?.() ?? new Date();
    const grouping: GroupingResult = options.recursive
      ? await groupTree(target, options.sort, {
          now,
          logger,
          onSkip: (directory) =>
            reporter.info(`Directory ${directory} is empty. Skipping.`),
        })
      : new Map([
          [target, await groupDirectory(target, options.sort, { now, logger })],
        ]);

    const keep: FileRecord[] = [];
    const remove: FileRecord[] = [];
    for (const [directory, buckets] of grouping) {
      const selection = selectRetention(buckets, options.keep, {
        retain: options.retain,
      });
      for (const line of renderSelection(directory, selection, options)) {
        reporter.info(line);
      }
      keep.push(...selection.keep);
      remove.push(...selection.delete);
    }

    const outcome = (
      status: PruneStatus,
      deleted: string[] = [],
      failures: DeletionFailure[] = [],
    ): PruneOutcome => ({
      status,
      keep: keep.map((r) => r.path),
      delete: remove.map((r) => r.path),
      deleted,
      failures,
    });

    if (options.printOnly) {
      machine.transition("dry-run");
      reporter.info("");
      reporter.info("Print-only enabled, no files were deleted.");
      machine.transition("done");
      return outcome("dry-run");
    }

    if (!options.force) {
      machine.transition("confirm");
      if (remove.length === 0) {
        reporter.info("No files to delete.");
        machine.transition("done", "nothing to delete");
        return outcome("nothing-to-delete");
      }
      if (keep.length === 0) {
        reporter.warn(DELETE_ALL_WARNING);
      }
      const answer = await confirm(CONFIRM_QUESTION);
      if (!isAffirmative(answer)) {
        reporter.info("Operation cancelled.");
        machine.transition("done", "cancelled");
        return outcome("cancelled");
      }
    }

    machine.transition("execute");
    if (remove.length === 0) {
      reporter.info("No files to delete.");
      machine.transition("done", "nothing to delete");
      return outcome("nothing-to-delete");
    }

    const report = await deleteFiles(
      remove.map((r) => r.path),
      { reporter, remove: deps.remove, logger },
    );
    machine.transition("done");
    return outcome("deleted", report.deleted, report.failures);
  } catch (err) {
    if (!machine.isTerminal()) {
      machine.transition(
        "error",
        err instanceof Error ? err.message : String(err),
      );
    }
    throw err;
  }
}
