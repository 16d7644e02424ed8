import { describe, expect, it } from "vitest";

import { escapeHtml, highlight } from "../highlighter";

describe("escapeHtml", () => {
  it("escapes markup-significant characters", () => {
    expect(escapeHtml(`<a href="x">&'`)).toBe("&lt;a href=&quot;x&quot;&gt;&amp;&#39;");
  });
});

describe("highlight", () => {
  it("marks up known languages", () => {
    const result = highlight("def f():\n    return 1", "python");

    expect(result.language).toBe("python");
    expect(result.html).toContain('<span class="hljs-keyword">return</span> <span class="hljs-number">1</span>');
  });

  it("matches language tags case-insensitively", () => {
    expect(highlight("let x = 1;", " JavaScript ").language).toBe("javascript");
  });

  it("falls back to escaped plain text for unknown tags", () => {
    expect(highlight("if (a < b) {}", "no-such-language")).toEqual({
      html: "if (a &lt; b) {}",
      language: "plaintext",
    });
  });

  it("never highlights plaintext", () => {
    expect(highlight("<b>x</b>", "plaintext")).toEqual({
      html: "&lt;b&gt;x&lt;/b&gt;",
      language: "plaintext",
    });
  });
});
