import { z } from "zod";
import { stat } from "node:fs/promises";
import {
  ConfigurationError,
  PathNotADirectoryError,
  toPathError,
} from "../errors/catalog.js";
import {
  PruneOptionsSchema,
  type PruneOptions,
  type PruneOptionsInput,
} from "../schemas/prune-config.js";

export interface ModeFlags {
  force?: boolean;
  printOnly?: boolean;
  quiet?: boolean;
}

/** Rejects flag combinations that contradict each other. No I/O. */
export function assertCompatibleModes(flags: ModeFlags): void {
  if (flags.quiet && flags.printOnly) {
    throw new ConfigurationError(
      "--quiet and --print-only cannot be used together.",
      { flags: ["quiet", "printOnly"] },
    );
  }
  if (flags.printOnly && flags.force) {
    throw new ConfigurationError(
      "--print-only and --force cannot be used together.",
      { flags: ["printOnly", "force"] },
    );
  }
}

export function validateOptions(input: PruneOptionsInput): PruneOptions {
  assertCompatibleModes(input);

  const result = PruneOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid options:\n${z.prettifyError(result.error)}`,
      { issues: result.error.issues },
    );
  }
  return result.data;
}

/** The target must exist and be a directory (symlinks to one are fine). */
export async function assertDirectory(path: string): Promise<void> {
  const stats = await stat(path).catch((err: unknown) => {
    throw toPathError(path, err);
  });
  if (!stats.isDirectory()) {
    throw new PathNotADirectoryError(path);
  }
}
