export { createProgram, execute, EXIT_USAGE, type CliIO } from "./program.js";
export { createReadlinePrompt, createStreamReporter } from "./terminal.js";
