// pattern: Functional Core

export type { ConversionOptions, ConversionResult, TruncationResult } from "./types.js";
export { convertHtml } from "./convert.js";
export { normalizeMarkdown } from "./whitespace.js";
export { truncateMarkdown } from "./truncate.js";
export { extractMainContent } from "./extract.js";
