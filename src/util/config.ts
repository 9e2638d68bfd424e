import { z } from "zod";
import { ConfigError } from "./errors.js";

const flag = z
  .string()
  .optional()
  .transform((v) => /^true$/i.test(v ?? "false"));

const idList = z
  .string()
  .optional()
  .transform((v) =>
    (v ?? "")
      .split(/[,\s]+/)
      .map((s) => s.trim())
      .filter(Boolean),
  );

// An empty variable counts as unset, so its default applies.
const unset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (v === "" ? undefined : v), schema);

const count = (fallback: number) => unset(z.coerce.number().int().positive().default(fallback));
const millis = (fallback: number) => unset(z.coerce.number().int().nonnegative().default(fallback));

const EnvSchema = z
  .object({
    DEVICEGATE_API_BASE: unset(z.string().url().optional()),
    DEVICEGATE_API_KEY: z.string().default(""),
    DEVICEGATE_DRY_RUN: flag,
    DEVICEGATE_DRY_RUN_DEVICES: idList,
    DEVICEGATE_ALLOWLIST: idList,
    DEVICEGATE_RATE_CAPACITY: count(30),
    DEVICEGATE_RATE_WINDOW_MS: count(60_000),
    DEVICEGATE_MIN_SPACING_MS: millis(2_000),
    DEVICEGATE_POLL_INTERVAL_MS: count(5_000),
    DEVICEGATE_REQUEST_TIMEOUT_MS: count(10_000),
    DEVICEGATE_LOG_LEVEL: unset(
      z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    ),
  })
  .refine((env) => env.DEVICEGATE_DRY_RUN || env.DEVICEGATE_API_BASE !== undefined, {
    message: "required unless DEVICEGATE_DRY_RUN=true",
    path: ["DEVICEGATE_API_BASE"],
  });

export type AppConfig = Readonly<{
  apiBase: string;
  apiKey: string;
  dryRun: boolean;
  dryRunDevices: readonly string[];
  allowlist: ReadonlySet<string>;
  rateWindowCapacity: number;
  rateWindowDurationMs: number;
  minRequestSpacingMs: number;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  logLevel: string;
}>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const e = parsed.data;
  return Object.freeze({
    apiBase: (e.DEVICEGATE_API_BASE ?? "").replace(/\/+$/, ""),
    apiKey: e.DEVICEGATE_API_KEY,
    dryRun: e.DEVICEGATE_DRY_RUN,
    dryRunDevices: e.DEVICEGATE_DRY_RUN_DEVICES,
    allowlist: new Set(e.DEVICEGATE_ALLOWLIST),
    rateWindowCapacity: e.DEVICEGATE_RATE_CAPACITY,
    rateWindowDurationMs: e.DEVICEGATE_RATE_WINDOW_MS,
    minRequestSpacingMs: e.DEVICEGATE_MIN_SPACING_MS,
    pollIntervalMs: e.DEVICEGATE_POLL_INTERVAL_MS,
    requestTimeoutMs: e.DEVICEGATE_REQUEST_TIMEOUT_MS,
    logLevel: e.DEVICEGATE_LOG_LEVEL,
  });
}

export function isAllowed(config: Pick<AppConfig, "allowlist">, deviceId: string): boolean {
  return config.allowlist.size === 0 || config.allowlist.has(deviceId);
}
