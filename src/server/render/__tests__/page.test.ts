import { describe, expect, it } from "vitest";

import { renderPastePage } from "../page";
import type { PasteRecord } from "../../storage/index-store";

const record = (extra: Partial<PasteRecord> = {}): PasteRecord => ({
  id: "abc12345",
  title: null,
  language: "plaintext",
  createdAt: new Date("2026-03-01T12:34:56.789Z"),
  expiresAt: null,
  burnAfterRead: false,
  size: 4,
  ...extra,
});

describe("renderPastePage", () => {
  it("escapes the title", () => {
    const html = renderPastePage(record({ title: "<b>notes</b>" }), "x");

    expect(html).toContain("<title>&lt;b&gt;notes&lt;/b&gt; - Quick Paste</title>");
    expect(html).toContain("<h2>&lt;b&gt;notes&lt;/b&gt;</h2>");
  });

  it("falls back to the id as title", () => {
    expect(renderPastePage(record(), "x")).toContain("<h2>abc12345</h2>");
  });

  it("shows metadata and links the raw view", () => {
    const html = renderPastePage(record({ expiresAt: new Date("2026-03-08T12:34:56.789Z") }), "x");

    expect(html).toContain("Language: plaintext |");
    expect(html).toContain("Created: 2026-03-01T12:34:56 | Expires: 2026-03-08T12:34:56 |");
    expect(html).toContain('<a href="/abc12345/raw">Raw</a>');
  });

  it("numbers every line", () => {
    expect(renderPastePage(record(), "a\nb\n")).toContain('<pre class="gutter">1\n2</pre>');
    expect(renderPastePage(record(), "a\nb\nc")).toContain('<pre class="gutter">1\n2\n3</pre>');
  });

  it("embeds escaped content for plain text", () => {
    expect(renderPastePage(record(), "<script>")).toContain(
      '<code class="hljs language-plaintext">&lt;script&gt;</code>',
    );
  });

  it("swaps the raw link for a notice on burn-after-read pastes", () => {
    const html = renderPastePage(record({ burnAfterRead: true }), "x");

    expect(html).not.toContain("/abc12345/raw");
    expect(html).toContain('<div class="notice">This paste was deleted after this view.</div>');
  });
});
