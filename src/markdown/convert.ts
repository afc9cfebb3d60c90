// pattern: Functional Core

import { parseHTML } from "linkedom";
import TurndownService from "turndown";
import { gfm } from "@truto/turndown-plugin-gfm";
import { ConversionError } from "../errors/index.js";
import { normalizeMarkdown } from "./whitespace.js";
import { truncateMarkdown } from "./truncate.js";
import type { ConversionOptions, ConversionResult } from "./types.js";

const STRIPPED_ELEMENTS = [
  "script",
  "style",
  "noscript",
  "iframe",
  "object",
  "embed",
  "template",
  "svg",
  "canvas",
  "link",
  "meta",
  "button",
  "input",
  "select",
  "textarea",
  "[hidden]",
].join(", ");

const SNIFF_LENGTH = 1024;
const MAX_CONTROL_RATIO = 0.1;

const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
  br: "\\",
});
turndown.use(gfm);

function assertText(input: unknown): asserts input is string {
  if (typeof input !== "string") {
    throw new ConversionError(`expected HTML text, got ${typeof input}`);
  }
  if (input.includes("\u0000")) {
    throw new ConversionError("input contains NUL bytes and is not text");
  }

  const sample = input.slice(0, SNIFF_LENGTH);
  let control = 0;
  for (let i = 0; i < sample.length; i++) {
    const code = sample.charCodeAt(i);
    const isAllowed = code === 9 || code === 10 || code === 12 || code === 13;
    if ((code < 32 && !isAllowed) || code === 127) {
      control++;
    }
  }
  if (sample.length > 0 && control / sample.length > MAX_CONTROL_RATIO) {
    throw new ConversionError("input looks like binary content, not HTML");
  }
}

function resolveReference(raw: string, baseUrl: string): string | null {
  try {
    return new URL(raw, baseUrl).href;
  } catch {
    return null;
  }
}

type ParsedDocument = ReturnType<typeof parseHTML>["document"];

function isTrackingPixel(img: { getAttribute(name: string): string | null }): boolean {
  const tiny = (attr: string): boolean => {
    const value = img.getAttribute(attr);
    if (value === null) return false;
    const size = Number.parseInt(value, 10);
    return Number.isFinite(size) && size <= 1;
  };
  const style = (img.getAttribute("style") ?? "").replace(/\s+/g, "").toLowerCase();
  return (
    tiny("width") ||
    tiny("height") ||
    style.includes("display:none") ||
    style.includes("visibility:hidden")
  );
}

function parseDocument(html: string): ParsedDocument {
  const source = /<body[\s>]/i.test(html)
    ? html
    : `<!DOCTYPE html><html><head></head><body>${html}</body></html>`;
  return parseHTML(source).document;
}

/**
 * Removes decorative and executable markup, then rewrites link and image
 * targets to absolute URLs. Targets that cannot be resolved are kept as text.
 */
function prepareBody(document: ParsedDocument, baseUrl: string): string {
  const body = document.body;

  for (const element of Array.from(body.querySelectorAll(STRIPPED_ELEMENTS))) {
    element.remove();
  }

  for (const img of Array.from(body.querySelectorAll("img"))) {
    if (isTrackingPixel(img)) {
      img.remove();
      continue;
    }
    img.removeAttribute("srcset");
    const raw = (img.getAttribute("src") ?? "").trim();
    if (raw === "") {
      img.remove();
      continue;
    }
    const resolved = resolveReference(raw, baseUrl);
    if (resolved === null) {
      const alt = (img.getAttribute("alt") ?? "").trim();
      img.replaceWith(document.createTextNode(alt ? `${alt} (${raw})` : raw));
    } else {
      img.setAttribute("src", resolved);
    }
  }

  for (const anchor of Array.from(body.querySelectorAll("a[href]"))) {
    const raw = (anchor.getAttribute("href") ?? "").trim();
    if (raw === "" || /^javascript:/i.test(raw)) {
      anchor.removeAttribute("href");
      continue;
    }
    const resolved = resolveReference(raw, baseUrl);
    if (resolved === null) {
      const label = (anchor.textContent ?? "").trim();
      anchor.replaceWith(document.createTextNode(label ? `${label} (${raw})` : raw));
    } else {
      anchor.setAttribute("href", resolved);
    }
  }

  return body.innerHTML;
}

/**
 * Convert an HTML document or fragment into normalized Markdown.
 * Structural HTML errors are repaired by the parser; only input that is not
 * text at all raises a ConversionError.
 */
export function convertHtml(
  html: unknown,
  baseUrl: string,
  options: ConversionOptions = {},
): ConversionResult {
  assertText(html);

  const cleaned = prepareBody(parseDocument(html), baseUrl);
  const markdown = normalizeMarkdown(turndown.turndown(cleaned));

  const startIndex = Math.max(0, Math.min(options.startIndex ?? 0, markdown.length));
  const cut = truncateMarkdown(markdown, options.maxLength, startIndex);

  return {
    markdown: cut.text,
    truncated: cut.truncated,
    totalLength: markdown.length,
    startIndex,
    ...(cut.nextStartIndex !== undefined && { nextStartIndex: cut.nextStartIndex }),
  };
}
