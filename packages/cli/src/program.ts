import { createRequire } from "node:module";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { loadConfig } from "@bucketprune/core/config";
import { isPruneError } from "@bucketprune/core/errors";
import { createLogger, type Logger } from "@bucketprune/core/logger";
import {
  assertCompatibleModes,
  runPrune,
  type Confirm,
} from "@bucketprune/core/prune";
import { parseSortMode, type RemoveFile } from "@bucketprune/core/retention";
import {
  LogLevelSchema,
  RetainPolicySchema,
  type LogLevel,
  type RetainPolicy,
  type SortMode,
} from "@bucketprune/core/schemas";
import { createReadlinePrompt, createStreamReporter } from "./terminal.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

/** Exit code for command-line usage errors reported by commander. */
export const EXIT_USAGE = 2;

export interface CliIO {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  stdin: NodeJS.ReadableStream;
  env?: NodeJS.ProcessEnv;
  // Seams for tests; production wiring leaves these unset.
  logger?: Logger;
  confirm?: Confirm;
  now?: () => Date;
  remove?: RemoveFile;
}

interface RawCliOptions {
  path: string;
  sort?: string;
  keep: number;
  force?: boolean;
  printOnly?: boolean;
  recursive?: boolean;
  quiet?: boolean;
  retain?: RetainPolicy;
  config?: string;
  logLevel?: LogLevel;
}

function parseKeep(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative whole number.");
  }
  return Number.parseInt(value, 10);
}

export function createProgram(io: Pick<CliIO, "stdout" | "stderr">): Command {
  return new Command()
    .name("bucketprune")
    .description(
      "Delete files exponentially by age: keep a few files per power-of-two day bucket",
    )
    .version(pkg.version)
    .requiredOption("-p, --path <dir>", "directory to operate on")
    .option(
      "-s, --sort <kind>",
      "timestamp to sort by: mtime (modification), ctime (creation), atime (access); default ctime",
    )
    .requiredOption(
      "-k, --keep <count>",
      "number of files to keep per time bucket",
      parseKeep,
    )
    .option(
      "-f, --force",
      "FOR EXPERTS ONLY: delete without asking for confirmation; cannot be used with --print-only",
    )
    .option(
      "-o, --print-only",
      "dry run, no files are deleted; cannot be used with --force or --quiet",
    )
    .option("-r, --recursive", "also process subdirectories, each on its own")
    .option(
      "-q, --quiet",
      "no output except errors; cannot be used with --print-only",
    )
    .addOption(
      new Option("--retain <policy>", "which end of each bucket to keep").choices(
        RetainPolicySchema.options,
      ),
    )
    .option("-c, --config <file>", "path to a JSON config file")
    .addOption(
      new Option("--log-level <level>", "diagnostic log level").choices(
        LogLevelSchema.options,
      ),
    )
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        io.stdout.write(str);
      },
      writeErr: (str) => {
        io.stderr.write(str);
      },
    });
}

/**
 * Runs the CLI against `argv` (without the node and script entries) and
 * resolves with the process exit code.
 */
export async function execute(
  argv: readonly string[],
  io: CliIO,
): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : EXIT_USAGE;
    }
    throw err;
  }

  const opts = program.opts<RawCliOptions>();
  const reporter = createStreamReporter(io.stdout, io.stderr);

  try {
    assertCompatibleModes(opts);

    const config = await loadConfig({ configPath: opts.config, env: io.env });
    const logger =
      io.logger ??
      createLogger({
        ...config.logging,
        level: opts.logLevel ?? config.logging.level,
      });

    let sort: SortMode = config.defaults.sort;
    if (opts.sort !== undefined) {
      const parsed = parseSortMode(opts.sort);
      if (!parsed.valid) {
        reporter.warn("Invalid sort type. Defaulting to ctime.");
      }
      sort = parsed.mode;
    }

    const outcome = await runPrune(
      {
        path: opts.path,
        keep: opts.keep,
        sort,
        force: opts.force ?? false,
        printOnly: opts.printOnly ?? false,
        recursive: opts.recursive ?? false,
        quiet: opts.quiet ?? false,
        retain: opts.retain ?? config.defaults.retain,
      },
      {
        reporter,
        confirm: io.confirm ?? createReadlinePrompt(io.stdin, io.stdout),
        logger,
        now: io.now,
        remove: io.remove,
      },
    );
    logger.debug(
      {
        status: outcome.status,
        kept: outcome.keep.length,
        deleted: outcome.deleted.length,
        failed: outcome.failures.length,
      },
      "Prune finished",
    );
    return 0;
  } catch (err) {
    if (isPruneError(err)) {
      reporter.error(`Error: ${err.message}`);
      return err.exitCode;
    }
    throw err;
  }
}
