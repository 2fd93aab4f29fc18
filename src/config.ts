import * as v from "valibot";
import { ConfigError } from "./errors";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = v.object({
  LOG_LEVEL: v.optional(v.picklist(LEVELS), "info"),
  LOG_PRETTY: v.optional(v.picklist(["true", "false"]), "false"),
  THREADLOG_DIR: v.optional(v.pipe(v.string(), v.minLength(1)), ".threadlog"),
  THREADLOG_DEVICE: v.optional(
    v.pipe(
      v.string(),
      v.regex(/^\d+$/, "must be a decimal integer"),
      v.transform(Number),
      v.maxValue(65535, "must be below 65536"),
    ),
    "0",
  ),
});

export interface Config {
  readonly logLevel: (typeof LEVELS)[number];
  readonly logPretty: boolean;
  /** Directory an FsSubstrate keeps its objects and refs in. */
  readonly dir: string;
  readonly device: number;
}

export const loadConfig = (env: Record<string, string | undefined> = process.env): Config => {
  const parsed = v.safeParse(EnvSchema, env);
  if (!parsed.success)
    throw new ConfigError(parsed.issues.map((i) => `${v.getDotPath(i) ?? "env"}: ${i.message}`));
  const out = parsed.output;
  return {
    logLevel: out.LOG_LEVEL,
    logPretty: out.LOG_PRETTY === "true",
    dir: out.THREADLOG_DIR,
    device: out.THREADLOG_DEVICE,
  };
};
