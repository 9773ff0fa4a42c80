/**
 * Start-up configuration: a JSON file validated with zod, with a couple of
 * environment overrides. Read once and frozen for the process lifetime.
 */

import fs from "fs";
import { z } from "zod";
import { ConfigError, formatZodError } from "../errors";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const SslSchema = z
  .object({
    enabled: z.boolean().default(false),
    keyFile: z.string().min(1).optional(),
    certFile: z.string().min(1).optional(),
    enforce: z.boolean().default(false),
  })
  .refine((ssl) => !ssl.enabled || (ssl.keyFile !== undefined && ssl.certFile !== undefined), {
    message: "keyFile and certFile are required when ssl is enabled",
  });

const DataSchema = z.discriminatedUnion("driver", [
  z.object({ driver: z.literal("memory") }),
  z.object({
    driver: z.literal("postgres"),
    databaseUrl: z.string().min(1),
    poolMax: z.number().int().positive().default(10),
    migrate: z.boolean().default(true),
  }),
]);

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default("0.0.0.0"),
      port: z.number().int().min(0).max(65535).default(8080),
      ssl: SslSchema.default({}),
    })
    .default({}),
  data: DataSchema.default({ driver: "memory" }),
  log: z
    .object({
      level: LogLevelSchema.default("info"),
      pretty: z.boolean().default(false),
    })
    .default({}),
  metrics: z
    .object({
      /** Process metrics (heap, event loop lag) next to the request metrics. */
      collectDefaults: z.boolean().default(true),
    })
    .default({}),
  docs: z
    .object({
      contact: z
        .object({
          name: z.string().min(1).optional(),
          email: z.string().email().optional(),
          url: z.string().url().optional(),
        })
        .optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type DataConfig = Config["data"];
export type ServerConfig = Config["server"];
export type LogConfig = Config["log"];
export type DocsConfig = Config["docs"];

export const DEFAULT_CONFIG_PATH = "./config.json";

type Env = Record<string, string | undefined>;

/** First positional argument, else CONFIG_PATH, else ./config.json. */
export function resolveConfigPath(argv: readonly string[], env: Env = process.env): string {
  const positional = argv.find((arg) => !arg.startsWith("--"));
  return positional ?? env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
}

function applyEnvOverrides(config: Config, env: Env): Config {
  let log = config.log;
  if (env.LOG_LEVEL !== undefined) {
    const level = LogLevelSchema.safeParse(env.LOG_LEVEL);
    if (!level.success) {
      throw new ConfigError(`Invalid LOG_LEVEL "${env.LOG_LEVEL}"`);
    }
    log = { ...log, level: level.data };
  }

  let data = config.data;
  if (data.driver === "postgres" && env.DATABASE_URL) {
    data = { ...data, databaseUrl: env.DATABASE_URL };
  }

  return { ...config, log, data };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function parseConfig(raw: unknown, env: Env = process.env): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(parsed.error)}`);
  }
  return deepFreeze(applyEnvOverrides(parsed.data, env));
}

export function loadConfig(path: string, env: Env = process.env): Config {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${path}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON`, { cause: error });
  }

  return parseConfig(raw, env);
}
