// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { truncateMarkdown } from "./truncate.js";

describe("truncateMarkdown", () => {
  it("returns the text unchanged without a limit", () => {
    expect(truncateMarkdown("a\nb", undefined)).toEqual({ text: "a\nb", truncated: false });
  });

  it("moves the cut before a code fence it would leave open", () => {
    const markdown = "Intro\n\n```\ncode line 1\ncode line 2\n```\n\nAfter";

    const result = truncateMarkdown(markdown, 20);

    expect(result).toEqual({ text: "Intro", truncated: true, nextStartIndex: 7 });
  });

  it("falls back to a word boundary on a single long line", () => {
    const result = truncateMarkdown("alpha beta gamma delta", 12);

    expect(result).toEqual({ text: "alpha beta", truncated: true, nextStartIndex: 11 });
  });

  it("hard-cuts a token with no whitespace", () => {
    const result = truncateMarkdown("x".repeat(30), 10);

    expect(result).toEqual({ text: "x".repeat(10), truncated: true, nextStartIndex: 10 });
  });

  it("does not split a surrogate pair on a hard cut", () => {
    const result = truncateMarkdown("\u{1F600}".repeat(5), 5);

    expect(result).toEqual({ text: "\u{1F600}\u{1F600}", truncated: true, nextStartIndex: 4 });
  });

  it("reads from a start index", () => {
    const result = truncateMarkdown("first\nsecond\nthird", 7, 6);

    expect(result).toEqual({ text: "second", truncated: true, nextStartIndex: 13 });
  });

  it("clamps a start index past the end", () => {
    expect(truncateMarkdown("short", 3, 99)).toEqual({ text: "", truncated: false });
  });
});
