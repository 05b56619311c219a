// =============================================================================
// Settings — defaults, .docweaverc.json and DOCWEAVE_* environment variables
// =============================================================================

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";

export const SETTINGS_FILE = ".docweaverc.json";
export const ENV_PREFIX = "DOCWEAVE_";

export const SettingsSchema = z
  .object({
    maxIterationsPerChunk: z.number().int().min(1).default(50),
    decisionTimeoutMs: z.number().int().min(1).default(120_000),
    keepLastRounds: z.number().int().min(0).default(2),
    maxContextRetries: z.number().int().min(0).default(2),
    maxChunkRetries: z.number().int().min(0).default(0),
    documentViewLimit: z.number().int().min(1).default(6000),
    schemaViewLimit: z.number().int().min(1).default(6000),
    readValueLimit: z.number().int().min(1).default(6000),
    guidanceLimit: z.number().int().min(1).default(6000),
    chunkSize: z.number().int().min(1).default(8000),
    chunkOverlap: z.number().int().min(0).default(400),
    minChunkSize: z.number().int().min(0).default(500),
    semanticChunking: z.boolean().default(true),
    breakpointThresholdType: z.enum(["percentile", "standard_deviation", "interquartile"]).default("percentile"),
    breakpointThresholdAmount: z.number().positive().optional(),
    shrinkageRatio: z.number().gt(0).max(1).default(0.5),
    shrinkageMinSize: z.number().int().min(0).default(64),
  })
  .strict()
  .refine((s) => s.chunkOverlap < s.chunkSize, {
    message: "must be smaller than chunkSize",
    path: ["chunkOverlap"],
  });

export type SettingsInput = z.input<typeof SettingsSchema>;
export type Settings = Readonly<z.output<typeof SettingsSchema>>;

export interface LoadSettingsOptions {
  /** Settings file; `false` skips it. Defaults to `.docweaverc.json` in `cwd` when present. */
  file?: string | false;
  /** Environment to read `DOCWEAVE_*` variables from (default: `process.env`). */
  env?: Record<string, string | undefined>;
  cwd?: string;
  /** Applied last. */
  overrides?: Partial<SettingsInput>;
}

/** `maxIterationsPerChunk` → `DOCWEAVE_MAX_ITERATIONS_PER_CHUNK` */
export function envVarName(key: string): string {
  return ENV_PREFIX + key.replace(/[A-Z]/g, (c) => `_${c}`).toUpperCase();
}

function parseEnvValue(raw: string): unknown {
  const trimmed = raw.trim();
  if (trimmed === "true") return true;
  if (trimmed === "false") return false;
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  return trimmed;
}

function readSettingsFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`${path} is not readable JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigurationError(`${path} must contain a JSON object`);
  }
  return { ...parsed };
}

function readEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const key of Object.keys(SettingsSchema.innerType().shape)) {
    const raw = env[envVarName(key)];
    if (raw !== undefined && raw.trim() !== "") values[key] = parseEnvValue(raw);
  }
  return values;
}

/**
 * Merges, in increasing precedence: defaults, the settings file, `DOCWEAVE_*`
 * variables and `overrides`. Throws {@link ConfigurationError} naming the
 * first invalid field.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const cwd = options.cwd ?? process.cwd();
  let fromFile: Record<string, unknown> = {};
  if (options.file !== false) {
    const path = options.file ?? join(cwd, SETTINGS_FILE);
    if (existsSync(path)) fromFile = readSettingsFile(path);
    else if (options.file !== undefined) throw new ConfigurationError(`settings file not found: ${path}`);
  }

  const merged = { ...fromFile, ...readEnv(options.env ?? process.env), ...options.overrides };
  const result = SettingsSchema.safeParse(merged);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue.path.length > 0 ? issue.path.join(".") : undefined;
    throw new ConfigurationError(issue.message, field);
  }
  return Object.freeze(result.data);
}
