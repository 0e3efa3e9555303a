import path from "node:path";
import { z } from "zod";
import { projectRootDir, resolveFromProjectRoot } from "./utils/fs.js";

function normalizeSecret(v: unknown): unknown {
  if (typeof v !== "string") return v;
  const s = v.trim();
  const m1 = s.match(/^["']([\s\S]*)["']$/);
  const v1 = (m1 ? m1[1] : s).trim();
  const m2 = v1.match(/^`([\s\S]*)`$/);
  return (m2 ? m2[1] : v1).trim();
}

function emptyAsUndefined(v: unknown): unknown {
  if (typeof v === "string" && !v.trim()) return undefined;
  return v;
}

const envSchema = z.object({
  GATEWAY_WS_URL: z.string().url().default("ws://127.0.0.1:6700"),
  GATEWAY_TOKEN: z.preprocess((v) => emptyAsUndefined(normalizeSecret(v)), z.string().min(1).optional()),
  COMMAND_PREFIX: z.string().min(1).max(3).default("."),

  DATA_DIR: z.string().default("data"),
  REMINDERS_FILE: z.preprocess(emptyAsUndefined, z.string().min(1).optional()),
  TIMEZONES_FILE: z.preprocess(emptyAsUndefined, z.string().min(1).optional()),

  REMIND_RETRY_MS: z.coerce.number().int().min(100).max(600_000).default(2000),
  DELIVERY_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),

  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

type ParsedEnv = z.infer<typeof envSchema>;

export type AppConfig = Omit<ParsedEnv, "REMINDERS_FILE" | "TIMEZONES_FILE"> & {
  REMINDERS_FILE: string;
  TIMEZONES_FILE: string;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse({ ...env });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Config error:\n${issues}`);
  }
  const cfg = parsed.data;
  const root = projectRootDir();
  const dataDir = resolveFromProjectRoot(cfg.DATA_DIR, root);
  return {
    ...cfg,
    DATA_DIR: dataDir,
    REMINDERS_FILE: cfg.REMINDERS_FILE ? resolveFromProjectRoot(cfg.REMINDERS_FILE, root) : path.join(dataDir, "reminders.json"),
    TIMEZONES_FILE: cfg.TIMEZONES_FILE ? resolveFromProjectRoot(cfg.TIMEZONES_FILE, root) : path.join(dataDir, "timezones.json")
  };
}
