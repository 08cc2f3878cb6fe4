import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(v => (v === undefined || v === "" ? fallback : v === "1" || v.toLowerCase() === "true"));

const SettingsSchema = z.object({
  LOG_LEVEL: z
    .preprocess(v => (typeof v === "string" ? v.toLowerCase() : v), z.enum(LOG_LEVELS))
    .catch("info"),
  QUIET: flag(false),
  LOG_STEPS: flag(true),
  STEPLINE_ENV_PREFIX: z.string().min(1).catch("STEPLINE__"),
});

export interface Settings {
  logLevel: LogLevel;
  /** QUIET=1 silences every logger. */
  quiet: boolean;
  /** LOG_STEPS=0 demotes per-step progress lines to debug. */
  logSteps: boolean;
  /** Prefix of the environment variables the default Context is built from. */
  envPrefix: string;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.parse({
    LOG_LEVEL: env.LOG_LEVEL,
    QUIET: env.QUIET,
    LOG_STEPS: env.LOG_STEPS,
    STEPLINE_ENV_PREFIX: env.STEPLINE_ENV_PREFIX,
  });
  return {
    logLevel: parsed.LOG_LEVEL,
    quiet: parsed.QUIET,
    logSteps: parsed.LOG_STEPS,
    envPrefix: parsed.STEPLINE_ENV_PREFIX,
  };
}
