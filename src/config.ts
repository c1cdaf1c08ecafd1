import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HEADER_SV_URL: z.string().url().default("http://127.0.0.1:33444"),
  // "0" hides the header / tips / peers proxy routes; the websocket stays up
  EXPOSE_HEADER_SV_APIS: z.enum(["0", "1"]).default("1"),
  TIP_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(10_000),
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  host: string;
  port: number;
  headerSvUrl: string;
  exposeHeaderSvApis: boolean;
  /** 0 disables the tip monitor. */
  tipPollIntervalMs: number;
  production: boolean;
  logLevel: LogLevel;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${fields}`);
  }

  const vars = parsed.data;
  const production = vars.NODE_ENV === "production";

  return {
    host: vars.HOST,
    port: vars.PORT,
    headerSvUrl: vars.HEADER_SV_URL.replace(/\/+$/, ""),
    exposeHeaderSvApis: vars.EXPOSE_HEADER_SV_APIS === "1",
    tipPollIntervalMs: vars.TIP_POLL_INTERVAL_MS,
    production,
    logLevel: vars.LOG_LEVEL ?? (production ? "info" : "debug"),
  };
}
