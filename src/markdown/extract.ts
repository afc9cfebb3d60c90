// pattern: Imperative Shell

import { Readability } from "@mozilla/readability";
import { parseHTML } from "linkedom";

type WarnLogger = Pick<Console, "warn">;

/**
 * Narrows a page to its main article with Readability.
 * Returns the original HTML when no article can be found.
 */
export function extractMainContent(html: string, logger: WarnLogger = console): string {
  try {
    const { document } = parseHTML(html);
    const article = new Readability(document).parse();
    const content = article?.content?.trim() ?? "";
    return content === "" ? html : content;
  } catch (error) {
    logger.warn(
      `[markdown] main content extraction failed, converting the whole page: ${error instanceof Error ? error.message : String(error)}`,
    );
    return html;
  }
}
