import os from "node:os";
import { z } from "zod";
import { ConfigError } from "./lib/errors.js";

const envSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  WORKER_MAX_JOBS: z.coerce.number().int().min(0).default(0),
  WORKER_READY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  WORKER_KILL_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
});

export interface PoolConfig {
  /** One worker process per logical core. */
  size: number;
  maxJobsPerWorker: number;
  readyTimeoutMs: number;
  killTimeoutMs: number;
}

export interface Config {
  host: string;
  port: number;
  logLevel: string;
  pool: PoolConfig;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cpuCount: number = os.availableParallelism()
): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    pool: {
      size: Math.max(1, cpuCount),
      maxJobsPerWorker: values.WORKER_MAX_JOBS,
      readyTimeoutMs: values.WORKER_READY_TIMEOUT_MS,
      killTimeoutMs: values.WORKER_KILL_TIMEOUT_MS,
    },
  };
}
