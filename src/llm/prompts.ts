import type { BudgetedDiff } from "./budget.js";

export function buildSystemPrompt(): string {
  return `You are a GitHub bot that writes constructive reviews for pull requests.

## What to Assess
1. **Bugs & correctness**: logic errors, off-by-one, null safety, edge cases
2. **Security**: hardcoded secrets, injection risks, auth issues
3. **Performance**: unnecessary work, N+1 patterns, blocking calls
4. **Readability & maintainability**: naming, structure, duplication

## Guidelines
- Be concise and specific. Reference file paths and the changed lines.
- Only comment on issues that matter. Skip style nits.
- Explain WHY something is a problem and suggest a fix when possible.
- Some files may be truncated or omitted for size; do not speculate about their contents.

## Output Format
Markdown suitable for a GitHub comment: a one-paragraph summary, then a
bulleted list of findings grouped by file. If nothing needs attention, say so briefly.`;
}

export function buildUserPrompt(diff: BudgetedDiff): string {
  const sections = diff.files.map((f) => {
    const header = f.truncated ? `File: ${f.path} (truncated)` : `File: ${f.path}`;
    return `${header}\n\`\`\`diff\n${f.patch}\n\`\`\``;
  });

  let prompt = `Analyze the following code changes and provide a detailed, helpful review.\n\n${sections.join("\n\n")}`;

  if (diff.omitted.length > 0) {
    prompt += `\n\nNot shown (binary, too large, or over budget):\n${diff.omitted
      .map((p) => `- ${p}`)
      .join("\n")}`;
  }

  return prompt;
}
