import "dotenv/config";
import path from "node:path";
import { z } from "zod";

// ────────────────  Runtime config (ENV‑driven)  ───────────────────────────

const expiryHours = z
  .string()
  .trim()
  .transform((value, ctx) => {
    if (value === "" || value === "0" || value.toLowerCase() === "never") return null;
    const hours = Number(value);
    if (!Number.isFinite(hours) || hours < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a non-negative number or 'never'" });
      return z.NEVER;
    }
    return hours;
  });

const envSchema = z.object({
  PASTE_DATA_DIR: z.string().min(1).default("./data"),
  PASTE_BASE_URL: z
    .string()
    .url()
    .default("http://localhost:8084")
    .transform(url => url.replace(/\/+$/, "")),
  PASTE_MAX_SIZE: z.coerce.number().int().positive().default(500_000),
  PASTE_DEFAULT_EXPIRY_HOURS: expiryHours.default("168"),
  HTTP_PORT: z.coerce.number().int().min(0).max(65_535).default(8084),
});

export interface AppConfig {
  /** Holds `index.json` and the `pastes/` directory. */
  dataDir: string;
  /** Public origin paste URLs are built on, without trailing slash. */
  baseUrl: string;
  /** Largest accepted paste, in UTF‑8 bytes. */
  maxSize: number;
  /** Lifetime given to pastes whose request omits one; null = forever. */
  defaultExpiryHours: number | null;
  port: number;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const cfg = parsed.data;
  return {
    dataDir: path.resolve(cfg.PASTE_DATA_DIR),
    baseUrl: cfg.PASTE_BASE_URL,
    maxSize: cfg.PASTE_MAX_SIZE,
    defaultExpiryHours: cfg.PASTE_DEFAULT_EXPIRY_HOURS,
    port: cfg.HTTP_PORT,
  };
}
