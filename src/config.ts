/**
 * Configuration for the Personio HR export.
 * Credentials come from the environment only. Everything else may also be set
 * in an optional YAML file (`CONFIG_FILE`, default `config.yml`); a non-empty
 * environment variable wins over the file, the file wins over the default.
 * Copy .env.example → .env and populate before running locally.
 */

import fs from "node:fs";
import cronParser from "cron-parser";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "config.yml";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return defaultValue;
      if (["true", "1", "yes"].includes(value)) return true;
      if (["false", "0", "no"].includes(value)) return false;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected true/false, got "${value}"`,
      });
      return z.NEVER;
    });

const integer = (defaultValue: number, min: number, max: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value === undefined || value === "" ? String(defaultValue) : value))
    .pipe(z.coerce.number().int().min(min).max(max));

const required = z.string().trim().min(1, "is required");

const envSchema = z.object({
  PERSONIO_CLIENT_ID: required,
  PERSONIO_CLIENT_SECRET: required,
  PERSONIO_BASE_URL: z.string().trim().url().default("https://api.personio.de"),
  EXPORT_OUTPUT_PATH: z.string().trim().min(1).default("./output"),
  EXPORT_INCLUDE_DOCUMENTS: booleanFlag(true),
  HTTP_TIMEOUT_MS: integer(30_000, 1_000, 600_000),
  HTTP_RETRY_MAX_ATTEMPTS: integer(5, 1, 10),
  HTTP_PAGE_SIZE: integer(100, 1, 200),
  DOCUMENT_CONCURRENCY: integer(4, 1, 16),
  SCHEDULE_ENABLED: booleanFlag(false),
  SCHEDULE_CRON: z
    .string()
    .trim()
    .default("0 2 * * *")
    .refine(isValidCron, { message: "is not a valid cron expression" }),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default("info"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

const section = <T extends z.ZodRawShape>(shape: T) => z.object(shape).partial().nullish();

/** config.yml layout; values are checked again by envSchema after the merge. */
const fileSchema = z
  .object({
    personio: section({ base_url: z.string() }),
    export: section({ output_path: z.string(), include_documents: z.boolean() }),
    http: section({
      timeout_ms: z.number(),
      retry_max_attempts: z.number(),
      page_size: z.number(),
    }),
    documents: section({ concurrency: z.number() }),
    schedule: section({ enabled: z.boolean(), cron: z.string() }),
    logging: section({ level: z.string() }),
  })
  .partial();

type FileConfig = z.infer<typeof fileSchema>;

export interface AppConfig {
  readonly personio: {
    readonly clientId: string;
    readonly clientSecret: string;
    readonly baseUrl: string;
  };
  readonly export: {
    readonly outputPath: string;
    readonly includeDocuments: boolean;
  };
  readonly http: {
    readonly timeoutMs: number;
    readonly retryMaxAttempts: number;
    readonly pageSize: number;
  };
  readonly documents: {
    readonly concurrency: number;
  };
  readonly schedule: {
    readonly enabled: boolean;
    readonly cron: string;
  };
  readonly logLevel: LogLevel;
}

/**
 * Validate the environment and build an immutable AppConfig.
 * Throws ConfigError naming every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: Record<string, string | undefined> = fileSettings(readConfigFile(env));
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") merged[key] = value;
  }

  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new ConfigError(
      `Invalid configuration: ${problems}. Copy .env.example to .env and populate it.`
    );
  }

  const e = parsed.data;
  return deepFreeze({
    personio: {
      clientId: e.PERSONIO_CLIENT_ID,
      clientSecret: e.PERSONIO_CLIENT_SECRET,
      baseUrl: e.PERSONIO_BASE_URL.replace(/\/+$/, ""),
    },
    export: {
      outputPath: e.EXPORT_OUTPUT_PATH,
      includeDocuments: e.EXPORT_INCLUDE_DOCUMENTS,
    },
    http: {
      timeoutMs: e.HTTP_TIMEOUT_MS,
      retryMaxAttempts: e.HTTP_RETRY_MAX_ATTEMPTS,
      pageSize: e.HTTP_PAGE_SIZE,
    },
    documents: {
      concurrency: e.DOCUMENT_CONCURRENCY,
    },
    schedule: {
      enabled: e.SCHEDULE_ENABLED,
      cron: e.SCHEDULE_CRON,
    },
    logLevel: e.LOG_LEVEL,
  });
}

/**
 * Read the YAML config file. A missing default file means "no file"; a missing
 * file named by CONFIG_FILE is an error.
 */
function readConfigFile(env: NodeJS.ProcessEnv): FileConfig {
  const named = env.CONFIG_FILE?.trim();
  const filePath = named || DEFAULT_CONFIG_FILE;
  if (!fs.existsSync(filePath)) {
    if (named) throw new ConfigError(`Config file ${filePath} not found`);
    return {};
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Failed to parse config file ${filePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = fileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config file ${filePath}: ${problems}`);
  }
  return parsed.data;
}

/** File values keyed by the environment variable they stand in for. */
function fileSettings(file: FileConfig): Record<string, string | undefined> {
  const text = (value: string | number | boolean | undefined) =>
    value === undefined ? undefined : String(value);
  return {
    PERSONIO_BASE_URL: file.personio?.base_url,
    EXPORT_OUTPUT_PATH: file.export?.output_path,
    EXPORT_INCLUDE_DOCUMENTS: text(file.export?.include_documents),
    HTTP_TIMEOUT_MS: text(file.http?.timeout_ms),
    HTTP_RETRY_MAX_ATTEMPTS: text(file.http?.retry_max_attempts),
    HTTP_PAGE_SIZE: text(file.http?.page_size),
    DOCUMENT_CONCURRENCY: text(file.documents?.concurrency),
    SCHEDULE_ENABLED: text(file.schedule?.enabled),
    SCHEDULE_CRON: file.schedule?.cron,
    LOG_LEVEL: file.logging?.level,
  };
}

function isValidCron(expression: string): boolean {
  try {
    cronParser.parseExpression(expression);
    return true;
  } catch {
    return false;
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object") deepFreeze(child);
  }
  return Object.freeze(value);
}
