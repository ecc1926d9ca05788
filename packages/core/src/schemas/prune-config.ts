import { z } from "zod";

export const DEFAULTS = {
  logging: {
    level: "warn" as const,
    pretty: false,
  },
  defaults: {
    sort: "ctime" as const,
    retain: "newest" as const,
  },
};

export const SortModeSchema = z
  .enum(["mtime", "ctime", "atime"])
  .describe("Which file timestamp drives age and ordering");

export const RetainPolicySchema = z
  .enum(["newest", "oldest"])
  .describe("Which end of each bucket survives the cut");

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "silent",
]);

/** On-disk configuration (config.json). Every field has a default. */
export const PruneConfigSchema = z.object({
  logging: z
    .object({
      level: LogLevelSchema.default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  defaults: z
    .object({
      sort: SortModeSchema.default(DEFAULTS.defaults.sort),
      retain: RetainPolicySchema.default(DEFAULTS.defaults.retain),
    })
    .default(DEFAULTS.defaults),
});

/** Options for a single prune run. */
export const PruneOptionsSchema = z.object({
  path: z.string().min(1, "A target path is required"),
  sort: SortModeSchema.default(DEFAULTS.defaults.sort),
  keep: z
    .number()
    .int("Keep count must be a whole number")
    .min(0, "Keep count must not be negative"),
  force: z.boolean().default(false),
  printOnly: z.boolean().default(false),
  recursive: z.boolean().default(false),
  quiet: z.boolean().default(false),
  retain: RetainPolicySchema.default(DEFAULTS.defaults.retain),
});

export type SortMode = z.infer<typeof SortModeSchema>;
export type RetainPolicy = z.infer<typeof RetainPolicySchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type PruneConfig = z.infer<typeof PruneConfigSchema>;
export type LoggingConfig = PruneConfig["logging"];
export type PruneOptions = z.infer<typeof PruneOptionsSchema>;
export type PruneOptionsInput = z.input<typeof PruneOptionsSchema>;
