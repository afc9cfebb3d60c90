// pattern: Functional Core

import { findOpenFence } from "./whitespace.js";
import type { TruncationResult } from "./types.js";

function lastWhitespaceAtOrBefore(text: string, index: number): number {
  for (let i = Math.min(index, text.length - 1); i > 0; i--) {
    const ch = text[i];
    if (ch === " " || ch === "\t" || ch === "\n") {
      return i;
    }
  }
  return -1;
}

function findCut(text: string, maxLength: number): number {
  const newline = text.lastIndexOf("\n", maxLength);
  if (newline > 0) {
    return newline;
  }
  const space = lastWhitespaceAtOrBefore(text, maxLength);
  if (space > 0) {
    return space;
  }
  // a single unbroken token longer than the limit; keep surrogate pairs whole
  const code = text.charCodeAt(maxLength - 1);
  return maxLength > 1 && code >= 0xd800 && code <= 0xdbff ? maxLength - 1 : maxLength;
}

/**
 * Cuts `markdown` (read from `startIndex`) to at most `maxLength` characters at
 * the nearest preceding line boundary, falling back to a word boundary.
 * A cut that would leave a code fence open moves back to before the fence.
 */
export function truncateMarkdown(
  markdown: string,
  maxLength: number | undefined,
  startIndex = 0,
): TruncationResult {
  const start = Math.max(0, Math.min(startIndex, markdown.length));
  const rest = markdown.slice(start);

  if (maxLength === undefined || rest.length <= maxLength) {
    return { text: rest, truncated: false };
  }

  let cut = findCut(rest, maxLength);
  const fence = findOpenFence(rest.slice(0, cut));
  if (fence !== null && fence > 0) {
    cut = fence;
  }

  const text = rest.slice(0, cut).trimEnd();

  let next = start + cut;
  while (next < markdown.length && /\s/.test(markdown.charAt(next))) {
    next++;
  }

  return { text, truncated: true, nextStartIndex: next };
}
