import { z } from "zod";
import { DEFAULT_PROBLEM_TYPE_BASE } from "../../core/errors/problem.js";
import { err, ok, type Result } from "../../core/types/result.js";

/**
 * Server config, validated once at boot via Zod.
 */
const configSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535).default(3000),
    host: z.string().min(1).default("0.0.0.0"),
    maxBodySize: z.coerce.number().int().positive().default(1_048_576),
    shutdownTimeoutMs: z.coerce.number().int().positive().default(10_000),
  }),

  log: z.object({
    level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),

  problems: z.object({
    typeBase: z.string().min(1).default(DEFAULT_PROBLEM_TYPE_BASE),
  }),
});

export type ServerConfig = z.infer<typeof configSchema>;

/** Field path (`server.port`) to its validation messages. */
export type ConfigErrors = Record<string, string[]>;

export type Env = Readonly<Record<string, string | undefined>>;

/** Empty variables count as unset. */
const read = (env: Env, key: string): string | undefined => {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value;
};

export const loadServerConfig = (env: Env = process.env): Result<ServerConfig, ConfigErrors> => {
  const result = configSchema.safeParse({
    server: {
      port: read(env, "PORT"),
      host: read(env, "HOST"),
      maxBodySize: read(env, "MAX_BODY_SIZE"),
      shutdownTimeoutMs: read(env, "SHUTDOWN_TIMEOUT_MS"),
    },
    log: {
      level: read(env, "LOG_LEVEL"),
      format: read(env, "LOG_FORMAT"),
    },
    problems: {
      typeBase: read(env, "PROBLEM_TYPE_BASE"),
    },
  });

  if (result.success) return ok(result.data);

  const errors: ConfigErrors = {};
  for (const issue of result.error.issues) {
    const key = issue.path.join(".");
    (errors[key] ??= []).push(issue.message);
  }
  return err(errors);
};
