import { describe, it, expect, vi, beforeEach } from "vitest";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("../../src/llm/client.js", () => ({
  getAnthropicClient: vi.fn(() => ({ messages: { create } })),
}));

import { DEFAULT_LLM_SETTINGS } from "../../src/config/defaults.js";
import { buildUserPrompt } from "../../src/llm/prompts.js";
import { generateReview } from "../../src/llm/reviewer.js";
import { GenerationError } from "../../src/utils/errors.js";
import { makeDiff, makeFile, SIMPLE_PATCH } from "../fixtures/webhook.js";

function textResponse(...texts: string[]) {
  return {
    content: texts.map((text) => ({ type: "text", text })),
    stop_reason: "end_turn",
  };
}

describe("generateReview", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("sends the diff to the configured model and returns the text", async () => {
    create.mockResolvedValueOnce(textResponse("  Looks good overall.  "));

    const review = await generateReview(makeDiff());

    expect(review).toBe("Looks good overall.");
    expect(create).toHaveBeenCalledTimes(1);
    const [params] = create.mock.calls[0];
    expect(params.model).toBe(DEFAULT_LLM_SETTINGS.model);
    expect(params.max_tokens).toBe(2048);
    expect(params.messages).toHaveLength(1);
    expect(params.messages[0].role).toBe("user");
    expect(params.messages[0].content).toContain(
      `File: src/app.ts\n\`\`\`diff\n${SIMPLE_PATCH}\n\`\`\``
    );
  });

  it("joins multiple text blocks", async () => {
    create.mockResolvedValueOnce(textResponse("Summary.", "\n- finding"));

    await expect(generateReview(makeDiff())).resolves.toBe("Summary.\n- finding");
  });

  it("fails on an empty response", async () => {
    create.mockResolvedValueOnce(textResponse("   "));

    await expect(generateReview(makeDiff())).rejects.toBeInstanceOf(GenerationError);
  });

  it("wraps API failures in GenerationError", async () => {
    const apiError = new Error("overloaded");
    create.mockRejectedValueOnce(apiError);

    const err = await generateReview(makeDiff()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationError);
    expect(err instanceof GenerationError && err.cause).toBe(apiError);
  });

  it("does not call the model when no file has patch text", async () => {
    const diff = makeDiff([makeFile({ path: "logo.png", patchText: "", patchMissing: true })]);

    await expect(generateReview(diff)).rejects.toBeInstanceOf(GenerationError);
    expect(create).not.toHaveBeenCalled();
  });

  it("honours the prompt budget from settings", async () => {
    create.mockResolvedValueOnce(textResponse("ok"));
    const diff = makeDiff([
      makeFile({ path: "small.ts", patchText: "+a", additions: 1, deletions: 0 }),
      makeFile({ path: "huge.ts", patchText: "+b".repeat(5000), additions: 5000, deletions: 0 }),
    ]);

    await generateReview(diff, { ...DEFAULT_LLM_SETTINGS, maxPromptChars: 100 });

    const content: string = create.mock.calls[0][0].messages[0].content;
    expect(content).toContain("File: small.ts");
    expect(content).not.toContain("File: huge.ts");
    expect(content).toContain("- huge.ts");
  });
});

describe("buildUserPrompt", () => {
  it("renders admitted, truncated and omitted files", () => {
    const prompt = buildUserPrompt({
      files: [
        { path: "a.ts", patch: "+x", truncated: false },
        { path: "b.ts", patch: "+y", truncated: true },
      ],
      omitted: ["logo.png"],
      usedChars: 0,
    });

    expect(prompt).toBe(
      "Analyze the following code changes and provide a detailed, helpful review.\n\n" +
        "File: a.ts\n```diff\n+x\n```\n\n" +
        "File: b.ts (truncated)\n```diff\n+y\n```\n\n" +
        "Not shown (binary, too large, or over budget):\n- logo.png"
    );
  });
});
