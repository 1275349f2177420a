import type { Env } from "./env.js";

export interface RetryPolicy {
  /** Total attempts for rate-limited or transient failures */
  transientAttempts: number;
  /** Total attempts for a failed model call */
  generationAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface LlmSettings {
  model: string;
  maxOutputTokens: number;
  maxPromptChars: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  transientAttempts: 3,
  generationAttempts: 2,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

export const DEFAULT_LLM_SETTINGS: LlmSettings = {
  model: "claude-sonnet-4-20250514",
  maxOutputTokens: 2048,
  // ~80k tokens at 4 chars per token
  maxPromptChars: 320_000,
};

export function retryPolicyFromEnv(env: Env): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    transientAttempts: env.RETRY_MAX_ATTEMPTS,
    baseDelayMs: env.RETRY_BASE_DELAY_MS,
  };
}

export function llmSettingsFromEnv(env: Env): LlmSettings {
  return {
    model: env.ANTHROPIC_MODEL,
    maxOutputTokens: env.REVIEW_MAX_OUTPUT_TOKENS,
    maxPromptChars: env.REVIEW_MAX_PROMPT_CHARS,
  };
}
