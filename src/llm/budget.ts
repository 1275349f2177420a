import type { DiffFile } from "../review/types.js";

export interface PromptFile {
  path: string;
  patch: string;
  truncated: boolean;
}

export interface BudgetedDiff {
  /** Admitted files, in the host's original order */
  files: PromptFile[];
  /** Files dropped for size or sent without a patch */
  omitted: string[];
  usedChars: number;
}

/** Per-file header and fence overhead in the rendered prompt */
export const FILE_OVERHEAD_CHARS = 32;
/** Below this much remaining budget a crossing file is dropped, not cut */
export const MIN_TRUNCATED_CHARS = 200;

/**
 * Picks the patches that fit in `maxChars`. Files with fewer changed lines
 * go first, so the largest changes are the ones truncated or dropped.
 */
export function fitFilesToBudget(
  files: readonly DiffFile[],
  maxChars: number
): BudgetedDiff {
  const ranked = files
    .map((file, index) => ({ file, index }))
    .filter(({ file }) => file.patchText.length > 0)
    .sort((a, b) => {
      const diff = changedLines(a.file) - changedLines(b.file);
      return diff !== 0 ? diff : a.index - b.index;
    });

  const admitted = new Map<number, PromptFile>();
  let usedChars = 0;

  for (const { file, index } of ranked) {
    const cost = fileCost(file.path, file.patchText);
    if (usedChars + cost <= maxChars) {
      admitted.set(index, { path: file.path, patch: file.patchText, truncated: false });
      usedChars += cost;
      continue;
    }

    const room = maxChars - usedChars - fileCost(file.path, "");
    if (room >= MIN_TRUNCATED_CHARS) {
      const patch = truncateAtLine(file.patchText, room);
      admitted.set(index, { path: file.path, patch, truncated: true });
      usedChars += fileCost(file.path, patch);
    }
  }

  const kept: PromptFile[] = [];
  const omitted: string[] = [];
  files.forEach((file, index) => {
    const entry = admitted.get(index);
    if (entry) {
      kept.push(entry);
    } else {
      omitted.push(file.path);
    }
  });

  return { files: kept, omitted, usedChars };
}

export function changedLines(file: DiffFile): number {
  return file.additions + file.deletions;
}

function fileCost(path: string, patch: string): number {
  return path.length + patch.length + FILE_OVERHEAD_CHARS;
}

function truncateAtLine(patch: string, maxChars: number): string {
  if (patch.length <= maxChars) return patch;
  const cut = patch.slice(0, maxChars);
  const lastNewline = cut.lastIndexOf("\n");
  return lastNewline > 0 ? cut.slice(0, lastNewline) : cut;
}
