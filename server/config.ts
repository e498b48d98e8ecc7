import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).transform((value) => value === "true");

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(5050),
  HOST: z.string().min(1).default("127.0.0.1"),
  REUSE_PORT: booleanFlag.default("false"),
  TICK_INTERVAL_MS: z.coerce.number().int().positive().default(250),
  DEFAULT_THRESHOLD: z.coerce.number().int().nonnegative().default(10),
  MIN_ZOOM_SPAN: z.coerce.number().positive().default(5),
  FOLLOW_NEW_RUNS: booleanFlag.default("true"),
  LIVE_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
  LOG_API_BODY: booleanFlag.default("false"),
});

export interface MonitorConfig {
  nodeEnv: string;
  port: number;
  host: string;
  reusePort: boolean;
  tickIntervalMs: number;
  defaultThreshold: number;
  minZoomSpan: number;
  followNewRuns: boolean;
  livePollIntervalMs: number;
  logApiBody: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    host: values.HOST,
    reusePort: values.REUSE_PORT,
    tickIntervalMs: values.TICK_INTERVAL_MS,
    defaultThreshold: values.DEFAULT_THRESHOLD,
    minZoomSpan: values.MIN_ZOOM_SPAN,
    followNewRuns: values.FOLLOW_NEW_RUNS,
    livePollIntervalMs: values.LIVE_POLL_INTERVAL_MS,
    logApiBody: values.LOG_API_BODY,
  };
}
