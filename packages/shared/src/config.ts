import { z } from "zod";

export const DEFAULT_EXPLANATION_TIMEOUT_MS = 10_000;

export const logLevelSchema = z.enum(["error", "warn", "info", "debug"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  DEFAULT_SLOT_LENGTH_MINUTES: z.coerce.number().positive().default(30),
  DEFAULT_BUFFER_MINUTES: z.coerce.number().nonnegative().default(10),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_BASE_URL: z.string().url().optional(),
  EXPLANATION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_EXPLANATION_TIMEOUT_MS),
  LOG_LEVEL: logLevelSchema.default("info")
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Blank values fall back to defaults instead of failing coercion.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  return envSchema.parse(present);
}
