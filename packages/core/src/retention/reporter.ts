/**
 * Operator-facing output. `info` is the report and progress stream and is
 * what quiet mode silences; `warn` and `error` always reach the operator.
 */
export interface Reporter {
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

/** Wraps a reporter so that `info` lines are dropped. */
export function quietReporter(inner: Reporter): Reporter {
  return {
    info: () => {},
    warn: (line) => inner.warn(line),
    error: (line) => inner.error(line),
  };
}
