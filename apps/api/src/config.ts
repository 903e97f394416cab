import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

/**
 * Loads `apps/api/env.local` into process.env (no dotfiles). Variables already set win.
 */
export function loadEnvLocal(envPath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "env.local")): void {
  if (!fs.existsSync(envPath)) return;
  const raw = fs.readFileSync(envPath, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const idx = s.indexOf("=");
    if (idx < 0) continue;
    const key = s.slice(0, idx).trim();
    const value = s.slice(idx + 1).trim();
    if (!key) continue;
    if (process.env[key] === undefined && value !== "") {
      process.env[key] = value;
    }
  }
}

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Announcements are off when unset.
  TELEGRAM_BOT_TOKEN: z.string().optional()
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const trimmed: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    const v = value?.trim();
    if (v) trimmed[key] = v;
  }
  const parsed = EnvSchema.safeParse(trimmed);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new Error(`Invalid env: ${fields}`);
  }
  return parsed.data;
}

export function getEnv(): Env {
  loadEnvLocal();
  return parseEnv(process.env);
}
