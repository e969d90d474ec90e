import { z } from "zod";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface EngineConfig {
  logLevel: LogLevel;
  requestTimeoutMs: number;
}

export const DEFAULT_CONFIG: EngineConfig = {
  logLevel: "info",
  requestTimeoutMs: 5000,
};

const envSchema = z.object({
  SCHED_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .default(DEFAULT_CONFIG.logLevel),
  SCHED_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CONFIG.requestTimeoutMs),
});

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid configuration ${issue.path.join(".")}: ${issue.message}`
    );
  }

  return {
    logLevel: parsed.data.SCHED_LOG_LEVEL,
    requestTimeoutMs: parsed.data.SCHED_REQUEST_TIMEOUT_MS,
  };
}
