// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { extractMainContent } from "./extract.js";

describe("extractMainContent", () => {
  it("keeps the article and drops the page chrome", () => {
    const html = `
      <html>
        <body>
          <nav><a href="/">Home</a><a href="/about">About</a></nav>
          <article>
            <h1>Quarterly Planning</h1>
            <p>The quarterly planning cycle starts with a review of last quarter's goals and their outcomes.</p>
            <p>Each team lead then drafts objectives for the coming quarter and shares them with the group.</p>
          </article>
          <footer><p>Footer text</p></footer>
        </body>
      </html>
    `;

    const content = extractMainContent(html);

    expect(content).toContain("The quarterly planning cycle starts");
    expect(content).not.toContain("Footer text");
  });
});
