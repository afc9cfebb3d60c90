// pattern: Functional Core

const FENCE_PATTERN = /^\s*(`{3,}|~{3,})/;

/**
 * Trims trailing whitespace per line, collapses runs of blank lines to one and
 * drops leading/trailing blank lines. Lines inside fenced code blocks pass
 * through untouched. Applying it twice yields the same string.
 */
export function normalizeMarkdown(markdown: string): string {
  const lines = markdown.replace(/\r\n?/g, "\n").split("\n");
  const out: Array<string> = [];
  let openFence: string | null = null;

  for (const line of lines) {
    const marker = FENCE_PATTERN.exec(line)?.[1];

    if (openFence !== null) {
      if (marker !== undefined && marker[0] === openFence[0] && marker.length >= openFence.length) {
        openFence = null;
        out.push(line.trimEnd());
      } else {
        out.push(line);
      }
      continue;
    }

    if (marker !== undefined) {
      openFence = marker;
      out.push(line.trimEnd());
      continue;
    }

    const trimmed = line.trimEnd();
    if (trimmed === "" && (out.length === 0 || out[out.length - 1] === "")) {
      continue;
    }
    out.push(trimmed);
  }

  while (out.length > 0 && out[out.length - 1] === "") {
    out.pop();
  }

  return out.join("\n");
}

/**
 * Offset of the opening line of a fence left unclosed at the end of `text`,
 * or null when every fence is closed.
 */
export function findOpenFence(text: string): number | null {
  let openAt: number | null = null;
  let openMarker = "";
  let offset = 0;

  for (const line of text.split("\n")) {
    const marker = FENCE_PATTERN.exec(line)?.[1];
    if (marker !== undefined) {
      if (openAt === null) {
        openAt = offset;
        openMarker = marker;
      } else if (marker[0] === openMarker[0] && marker.length >= openMarker.length) {
        openAt = null;
      }
    }
    offset += line.length + 1;
  }

  return openAt;
}
