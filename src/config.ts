import { z } from "zod";
import { ConfigError } from "./errors.js";

export type DispatchConfig = {
  backend: {
    baseUrl: string;
    path: string;
    model: string;
  };
  timeouts: {
    /** Per generation exchange, not per retry sequence */
    generationMs: number;
    healthCheckMs: number;
    /** Time in-flight exchanges get to finish after a cancel */
    cancelGraceMs: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Fraction of each delay that may be randomly shaved off, 0..1 */
    jitter: number;
    /** Overall budget for one retry sequence */
    deadlineMs: number;
  };
  generation: {
    minResponseLength: number;
    temperature: number;
    topK: number;
    topP: number;
  };
  limits: {
    previewLength: number;
    summaryLength: number;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: DispatchConfig = {
  backend: {
    baseUrl: "http://localhost:11434",
    path: "/api/generate",
    model: "llama3.2",
  },
  timeouts: {
    generationMs: 60_000,
    healthCheckMs: 5_000,
    cancelGraceMs: 5_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 10_000,
    jitter: 0.5,
    deadlineMs: 180_000,
  },
  generation: {
    minResponseLength: 1,
    temperature: 0.7,
    topK: 40,
    topP: 0.9,
  },
  limits: {
    previewLength: 80,
    summaryLength: 50,
  },
};

const positive = z.number().int().positive();

const DispatchConfigSchema = z
  .object({
    backend: z.object({
      baseUrl: z.string().url(),
      path: z.string().startsWith("/"),
      model: z.string().min(1),
    }),
    timeouts: z.object({
      generationMs: positive,
      healthCheckMs: positive,
      cancelGraceMs: z.number().int().nonnegative(),
    }),
    retry: z.object({
      maxAttempts: positive,
      baseDelayMs: z.number().int().nonnegative(),
      maxDelayMs: z.number().int().nonnegative(),
      jitter: z.number().min(0).max(1),
      deadlineMs: positive,
    }),
    generation: z.object({
      minResponseLength: z.number().int().nonnegative(),
      temperature: z.number().min(0),
      topK: positive,
      topP: z.number().min(0).max(1),
    }),
    limits: z.object({
      previewLength: positive,
      summaryLength: positive,
    }),
  })
  .refine((c) => c.retry.maxDelayMs >= c.retry.baseDelayMs, {
    message: "retry.maxDelayMs must be >= retry.baseDelayMs",
    path: ["retry", "maxDelayMs"],
  });

let current: DispatchConfig = structuredClone(DEFAULTS);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    const existing = result[key];
    if (isRecord(val) && isRecord(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Merge overrides onto the defaults and validate. Throws ConfigError on bad values. */
export function configure(overrides: DeepPartial<DispatchConfig>): void {
  const merged = deepMerge(DEFAULTS, overrides);
  const parsed = DispatchConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  current = parsed.data;
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<DispatchConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<DispatchConfig> = Object.freeze(structuredClone(DEFAULTS));

function intFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return n;
}

/** Read the TEAM_DISPATCH_* variables into a partial override for `configure`. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DeepPartial<DispatchConfig> {
  const overrides: DeepPartial<DispatchConfig> = {};
  const baseUrl = env.TEAM_DISPATCH_BASE_URL;
  const model = env.TEAM_DISPATCH_MODEL;
  if (baseUrl || model) {
    overrides.backend = {
      ...(baseUrl ? { baseUrl } : {}),
      ...(model ? { model } : {}),
    };
  }
  const generationMs = intFromEnv(env, "TEAM_DISPATCH_TIMEOUT_MS");
  if (generationMs !== undefined) overrides.timeouts = { generationMs };
  const maxAttempts = intFromEnv(env, "TEAM_DISPATCH_MAX_ATTEMPTS");
  if (maxAttempts !== undefined) overrides.retry = { maxAttempts };
  return overrides;
}
