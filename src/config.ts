import * as dotenv from "dotenv";
import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { SOURCE_KINDS, isSourceKind, type SourceKind } from "./journal/types.js";

// Load env from the working directory first, then fall back to the parent
// directory's .env without overriding anything already set.
const localEnvPath = path.join(process.cwd(), ".env");
if (existsSync(localEnvPath)) dotenv.config({ path: localEnvPath });
const parentEnvPath = path.resolve(process.cwd(), "..", ".env");
if (existsSync(parentEnvPath)) dotenv.config({ path: parentEnvPath, override: false });

const BoolFromString = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

const LogLevel = z.enum(["debug", "info", "warn", "error"]);

const QueryValue = z.union([z.string(), z.number(), z.boolean()]);
export type QueryParams = Record<string, string | number | boolean>;

const JsonParams = z
  .string()
  .transform((raw, ctx): QueryParams => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON object" });
      return z.NEVER;
    }
    const result = z.record(QueryValue).safeParse(parsed);
    if (!result.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON object of string/number/boolean values" });
      return z.NEVER;
    }
    return result.data;
  });

const OptionalPath = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? expandHome(v.trim()) : undefined));

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

const envSchemaBase = z.object({
  // Journal layout
  TARGET_DIR: z.string().default(""),
  JOURNAL_SOURCES: z.string().default(SOURCE_KINDS.join(",")),
  JOURNAL_CREATE_MISSING: BoolFromString.default("true"),
  // API sources describe "today"; their records land in the journal of run date + offset.
  API_DAY_OFFSET: z.coerce.number().int().min(-31).max(31).default(-1),

  // HTTP
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  HTTP_RETRIES: z.coerce.number().int().min(0).max(10).default(2),

  // News API
  NEWS_ENDPOINT: z.string().optional(),
  NEWS_KEY: z.string().optional(),
  NEWS_PARAMS: JsonParams.default('{"country":"US","lang":"en","limit":5}'),

  // Weather API
  WEATHER_ENDPOINT: z.string().optional(),
  WEATHER_KEY: z.string().optional(),
  WEATHER_PARAMS: JsonParams.default("{}"),
  LATITUDE: z.coerce.number().min(-90).max(90).optional(),
  LONGITUDE: z.coerce.number().min(-180).max(180).optional(),

  // Box office API
  MOVIES_ENDPOINT: z.string().optional(),
  MOVIES_KEY: z.string().optional(),
  MOVIES_PARAMS: JsonParams.default("{}"),

  // Billboard chart API
  CHART_ENDPOINT: z.string().optional(),
  CHART_KEY: z.string().optional(),
  CHART_PARAMS: JsonParams.default("{}"),

  // File exports
  NETFLIX_FILE_LOCATION: OptionalPath,
  APPLE_MUSIC_FILE_PATH: OptionalPath,
  FANDANGO_CSV_FILE: OptionalPath,
  TICKET_MASTER_CSV_FILE: OptionalPath,
  YELP_USER_REVIEWS_HTML: OptionalPath,
  DELETE_AFTER_PROCESSING: BoolFromString.default("false"),

  LOG_LEVEL: LogLevel.default("info")
});

const envSchema = envSchemaBase.superRefine((cfg, ctx) => {
  if (!cfg.TARGET_DIR.trim()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["TARGET_DIR"],
      message: "TARGET_DIR is required"
    });
  }

  for (const name of splitList(cfg.JOURNAL_SOURCES)) {
    if (!isSourceKind(name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["JOURNAL_SOURCES"],
        message: `unknown source kind "${name}" (expected one of ${SOURCE_KINDS.join(", ")})`
      });
    }
  }
});

export type AppConfig = z.infer<typeof envSchema>;

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

export type ApiPrefix = "NEWS" | "WEATHER" | "MOVIES" | "CHART";

export type ApiEndpoint = {
  endpoint: string;
  key: string;
  params: QueryParams;
};

function validateEndpoints(cfg: AppConfig): string[] {
  const errors: string[] = [];
  const enabled = enabledSources(cfg);
  const apis: Array<[SourceKind, ApiPrefix]> = [
    ["news", "NEWS"],
    ["weather", "WEATHER"],
    ["movies", "MOVIES"],
    ["chart", "CHART"]
  ];

  for (const [kind, prefix] of apis) {
    const endpoint = cfg[`${prefix}_ENDPOINT`];
    if (!enabled.includes(kind) || !endpoint || !endpoint.trim()) continue;
    try {
      const url = new URL(endpoint);
      if (url.protocol !== "http:" && url.protocol !== "https:") {
        errors.push(`${prefix}_ENDPOINT must be an http(s) URL: ${endpoint}`);
      }
    } catch {
      errors.push(`${prefix}_ENDPOINT must be a valid URL: ${endpoint}`);
    }
  }

  if ((cfg.LATITUDE === undefined) !== (cfg.LONGITUDE === undefined)) {
    errors.push("LATITUDE and LONGITUDE must be set together");
  }

  return errors;
}

// Blank assignments in .env files (`LATITUDE=`) mean "unset".
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `  - ${i.path.join(".") || "env"}: ${i.message}`);
    throw new Error(`Config validation errors:\n${lines.join("\n")}`);
  }

  const cfg = { ...parsed.data, TARGET_DIR: path.resolve(expandHome(parsed.data.TARGET_DIR.trim())) };

  const errors = validateEndpoints(cfg);
  if (errors.length > 0) {
    throw new Error(`Config validation errors:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }

  return cfg;
}

export function enabledSources(cfg: AppConfig): SourceKind[] {
  return SOURCE_KINDS.filter((kind) => splitList(cfg.JOURNAL_SOURCES).includes(kind));
}

/**
 * Endpoint bundle for an API source, or null when the endpoint or key is not
 * configured. Weather params get LATITUDE/LONGITUDE when they lack them.
 */
export function apiEndpointFor(cfg: AppConfig, prefix: ApiPrefix): ApiEndpoint | null {
  const endpoint = cfg[`${prefix}_ENDPOINT`]?.trim();
  const key = cfg[`${prefix}_KEY`]?.trim();
  if (!endpoint || !key) return null;

  const params: QueryParams = { ...cfg[`${prefix}_PARAMS`] };
  if (prefix === "WEATHER" && !("latitude" in params) && !("longitude" in params)) {
    if (cfg.LATITUDE !== undefined && cfg.LONGITUDE !== undefined) {
      params.latitude = cfg.LATITUDE;
      params.longitude = cfg.LONGITUDE;
    }
  }

  return { endpoint, key, params };
}
