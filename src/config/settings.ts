import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { parse } from "dotenv";
import { z } from "zod";
import { DEFAULT_UPLOAD_TIMEOUT_MS } from "../clients/immich-client";
import { ConfigError } from "../types/errors";

export const DEFAULT_STATE_FILE = "./reexport-sync.state.json";
export const DEFAULT_REPORT_FILE = "./reexport-sync.report.tsv";
export const DEFAULT_DEVICE_ID = "reexport-sync";
export const DEFAULT_IGNORE_PATTERNS = ["**/.*"];

const flag = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === "boolean" ? value : ["1", "true", "yes", "on"].includes(value.trim().toLowerCase())
  );

const patternList = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? [...DEFAULT_IGNORE_PATTERNS]
      : value
          .split(",")
          .map((pattern) => pattern.trim())
          .filter((pattern) => pattern.length > 0)
  );

const settingsSchema = z
  .object({
    serverUrl: z.string({ required_error: "IMMICH_URL or --server is required" }).url(),
    apiKey: z.string({ required_error: "IMMICH_API_KEY is required" }).min(1),
    exportRoot: z.string({ required_error: "ROOT or --root is required" }).min(1),
    exportAlbum: z.string().min(1).optional(),
    dryRun: flag.default(false),
    stateFile: z.string().min(1).default(DEFAULT_STATE_FILE),
    reportFile: z.string().min(1).default(DEFAULT_REPORT_FILE),
    concurrency: z.coerce.number().int().min(1).max(32).default(4),
    timeWindowSeconds: z.coerce.number().positive().default(2),
    requestTimeoutMs: z.coerce.number().int().positive().default(60_000),
    uploadTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_UPLOAD_TIMEOUT_MS),
    maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
    maxFileSizeMB: z.coerce.number().positive().default(2048),
    deviceId: z.string().min(1).default(DEFAULT_DEVICE_ID),
    ignorePatterns: patternList,
  })
  .superRefine((settings, ctx) => {
    // The export tree is read-only.
    const root = path.resolve(settings.exportRoot);
    for (const key of ["stateFile", "reportFile"] as const) {
      if (path.resolve(settings[key]).startsWith(`${root}${path.sep}`)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "must not be inside the export root",
        });
      }
    }
  });

export type Settings = z.output<typeof settingsSchema>;

export type CliOverrides = {
  serverUrl?: string;
  exportRoot?: string;
  exportAlbum?: string;
  dryRun?: boolean;
  stateFile?: string;
  reportFile?: string;
  concurrency?: string | number;
};

type Env = Record<string, string | undefined>;

/**
 * Loads `.env` then `.env.local` from `cwd`. Variables already present in the
 * environment are never overwritten; `.env.local` wins over `.env`.
 */
export function loadEnvFiles(cwd: string = process.cwd(), env: Env = process.env): void {
  const preset = new Set(Object.keys(env).filter((key) => env[key] !== undefined));
  for (const name of [".env", ".env.local"]) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    let parsed: Record<string, string>;
    try {
      parsed = parse(readFileSync(filePath, "utf8"));
    } catch (error) {
      throw new ConfigError(`Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    for (const [key, value] of Object.entries(parsed)) {
      if (!preset.has(key)) {
        env[key] = value;
      }
    }
  }
}

const envValue = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

export function resolveSettings(env: Env, overrides: CliOverrides = {}): Settings {
  const result = settingsSchema.safeParse({
    serverUrl: overrides.serverUrl ?? envValue(env, "IMMICH_URL"),
    apiKey: envValue(env, "IMMICH_API_KEY"),
    exportRoot: overrides.exportRoot ?? envValue(env, "ROOT"),
    exportAlbum: overrides.exportAlbum ?? envValue(env, "EXPORT_ALBUM"),
    dryRun: overrides.dryRun || envValue(env, "DRY_RUN"),
    stateFile: overrides.stateFile ?? envValue(env, "STATE_FILE"),
    reportFile: overrides.reportFile ?? envValue(env, "REPORT_FILE"),
    concurrency: overrides.concurrency ?? envValue(env, "CONCURRENCY"),
    timeWindowSeconds: envValue(env, "TIME_WINDOW_SECONDS"),
    requestTimeoutMs: envValue(env, "REQUEST_TIMEOUT_MS"),
    uploadTimeoutMs: envValue(env, "UPLOAD_TIMEOUT_MS"),
    maxAttempts: envValue(env, "MAX_ATTEMPTS"),
    maxFileSizeMB: envValue(env, "MAX_FILE_SIZE_MB"),
    deviceId: envValue(env, "DEVICE_ID"),
    ignorePatterns: env.IGNORE_PATTERNS,
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  return result.data;
}
