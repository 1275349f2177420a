import { z } from "zod";

const envSchema = z.object({
  // GitHub App
  GITHUB_APP_ID: z.string().min(1),
  GITHUB_PRIVATE_KEY: z.string().min(1),
  GITHUB_WEBHOOK_SECRET: z.string().min(1),
  GITHUB_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TOKEN_REFRESH_MARGIN_SECONDS: z.coerce.number().int().min(0).default(60),

  // Anthropic
  ANTHROPIC_API_KEY: z.string().min(1),
  ANTHROPIC_MODEL: z.string().default("claude-sonnet-4-20250514"),
  LLM_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  REVIEW_MAX_PROMPT_CHARS: z.coerce.number().int().positive().default(320_000),
  REVIEW_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(2048),

  // Failure policy
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  // Server
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(): Env {
  if (_env) return _env;
  _env = parseEnv(process.env);
  return _env;
}

export function parseEnv(source: Record<string, string | undefined>): Env {
  const raw = { ...source };

  // Decode base64 private key if needed
  if (raw.GITHUB_PRIVATE_KEY && !raw.GITHUB_PRIVATE_KEY.includes("BEGIN")) {
    raw.GITHUB_PRIVATE_KEY = Buffer.from(
      raw.GITHUB_PRIVATE_KEY,
      "base64"
    ).toString("utf-8");
  }

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const missing = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid environment variables:\n${missing}`);
  }

  return result.data;
}
