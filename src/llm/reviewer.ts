import type Anthropic from "@anthropic-ai/sdk";
import { DEFAULT_LLM_SETTINGS, type LlmSettings } from "../config/defaults.js";
import type { DiffBundle } from "../review/types.js";
import { GenerationError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { fitFilesToBudget } from "./budget.js";
import { getAnthropicClient } from "./client.js";
import { buildSystemPrompt, buildUserPrompt } from "./prompts.js";

const log = createChildLogger({ module: "llm-reviewer" });

/** Review text for the diff, used verbatim as the comment body */
export async function generateReview(
  diff: DiffBundle,
  settings: LlmSettings = DEFAULT_LLM_SETTINGS
): Promise<string> {
  const budgeted = fitFilesToBudget(diff.files, settings.maxPromptChars);
  if (budgeted.files.length === 0) {
    throw new GenerationError(`PR #${diff.pullNumber} has no patch text to review`);
  }

  log.info(
    {
      pr: diff.pullNumber,
      sha: diff.headSha,
      filesIncluded: budgeted.files.length,
      filesOmitted: budgeted.omitted.length,
      truncated: budgeted.files.filter((f) => f.truncated).length,
      promptChars: budgeted.usedChars,
    },
    "Requesting review from model"
  );

  let response: Anthropic.Message;
  try {
    response = await getAnthropicClient().messages.create({
      model: settings.model,
      max_tokens: settings.maxOutputTokens,
      system: buildSystemPrompt(),
      messages: [{ role: "user", content: buildUserPrompt(budgeted) }],
    });
  } catch (err) {
    throw new GenerationError("Model request failed", { cause: err });
  }

  const text = response.content
    .filter((b): b is Anthropic.TextBlock => b.type === "text")
    .map((b) => b.text)
    .join("")
    .trim();

  if (!text) {
    throw new GenerationError(
      `Model returned no text (stop_reason: ${response.stop_reason ?? "unknown"})`
    );
  }

  log.info({ pr: diff.pullNumber, sha: diff.headSha, chars: text.length }, "Review generated");
  return text;
}
