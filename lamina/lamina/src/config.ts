import { z } from "zod";
import { logLevels } from "./logging";

export const logLevelSchema = z.enum(logLevels);

const defaultLogLevel = () => {
  const parsed = logLevelSchema.safeParse(process.env.LAMINA_LOG_LEVEL);
  return parsed.success ? parsed.data : "warn";
};

export const sessionOptionsSchema = z.object({
  /** Shown as the log prefix of everything the session reports. */
  label: z.string().min(1).default("lamina"),
  logLevel: logLevelSchema.default(defaultLogLevel),
});

export type SessionOptionsInput = z.input<typeof sessionOptionsSchema>;
export type SessionOptions = z.output<typeof sessionOptionsSchema>;

export const linkedObjectHandlingSchema = z.enum(["keep", "discard", "copy"]);
export type LinkedObjectHandling = z.output<typeof linkedObjectHandlingSchema>;

export const copyOptionsSchema = z.object({
  linkedObjectHandling: linkedObjectHandlingSchema.default("copy"),
});
