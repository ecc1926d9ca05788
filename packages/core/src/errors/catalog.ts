/**
 * Typed error catalog for prune runs.
 *
 * Every fatal failure carries a `kind` that mirrors the filesystem error
 * family it belongs to, a stable `errorCode`, and the exit code the CLI
 * reports for it.
 */

export type PruneErrorKind =
  | "Configuration"
  | "NotFound"
  | "NotADirectory"
  | "IOFailure";

export class PruneError extends Error {
  constructor(
    public readonly kind: PruneErrorKind,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  get exitCode(): number {
    return 1;
  }
}

export function isPruneError(value: unknown): value is PruneError {
  return value instanceof PruneError;
}

// Configuration, raised before any filesystem access

export class ConfigurationError extends PruneError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("Configuration", "CONFIGURATION_ERROR", message, details);
  }
}

// Path validity

export class PathNotFoundError extends PruneError {
  constructor(
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(
      "NotFound",
      "PATH_NOT_FOUND",
      `The provided path does not exist: ${path}`,
      { path },
      options,
    );
  }
}

export class PathNotADirectoryError extends PruneError {
  constructor(
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(
      "NotADirectory",
      "PATH_NOT_A_DIRECTORY",
      `The provided path is a file, not a directory: ${path}`,
      { path },
      options,
    );
  }
}

// Scan results

export class EmptyResultError extends PruneError {
  constructor(
    public readonly path: string,
    scope: { recursive?: boolean } = {},
  ) {
    super(
      "NotFound",
      "EMPTY_RESULT",
      scope.recursive
        ? "No files found in the directory or its subdirectories. Remember that the program only works with files, not directories."
        : "No files found in the directory. Remember that the program only works with files, not directories.",
      { path, recursive: scope.recursive ?? false },
    );
  }
}

export class IOFailureError extends PruneError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(
      "IOFailure",
      "IO_FAILURE",
      `Failed to read ${path}: ${describeCause(cause)}`,
      { path, ...(errnoCode(cause) !== undefined && { code: errnoCode(cause) }) },
      { cause },
    );
  }
}

/** A single file that could not be removed. Recorded, never thrown. */
export interface DeletionFailure {
  path: string;
  message: string;
  code?: string;
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Maps a rejected fs call on `path` to the catalog.
 * ENOENT and ENOTDIR keep their meaning, anything else is an I/O failure.
 */
export function toPathError(path: string, err: unknown): PruneError {
  switch (errnoCode(err)) {
    case "ENOENT":
      return new PathNotFoundError(path, { cause: err });
    case "ENOTDIR":
      return new PathNotADirectoryError(path, { cause: err });
    default:
      return new IOFailureError(path, err);
  }
}
