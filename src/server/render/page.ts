import type { PasteRecord } from "../storage/index-store";
import { escapeHtml, highlight } from "./highlighter";

/** Dark palette for the highlight.js token classes. */
const STYLES = `
  body { font-family: monospace; margin: 20px; background: #1e1e1e; color: #d4d4d4; }
  .header { margin-bottom: 20px; }
  .header a { color: #569cd6; }
  .meta { color: #808080; font-size: 0.9em; }
  .notice { color: #ce9178; margin-top: 6px; }
  .paste { display: flex; background: #2d2d2d; overflow-x: auto; }
  .paste pre { margin: 0; padding: 15px; }
  .gutter { color: #5a5a5a; text-align: right; user-select: none; border-right: 1px solid #3c3c3c; }
  .hljs-keyword, .hljs-selector-tag, .hljs-built_in { color: #569cd6; }
  .hljs-string, .hljs-attr, .hljs-template-tag { color: #ce9178; }
  .hljs-number, .hljs-literal { color: #b5cea8; }
  .hljs-comment, .hljs-quote { color: #6a9955; font-style: italic; }
  .hljs-title, .hljs-section, .hljs-name { color: #dcdcaa; }
  .hljs-type, .hljs-class .hljs-title { color: #4ec9b0; }
  .hljs-variable, .hljs-params, .hljs-property { color: #9cdcfe; }
  .hljs-meta, .hljs-tag { color: #808080; }
  .hljs-regexp, .hljs-symbol { color: #d16969; }
`;

const lineNumbers = (content: string): string => {
  const count = content.split("\n").length - (content.endsWith("\n") ? 1 : 0);
  return Array.from({ length: Math.max(count, 1) }, (_, i) => String(i + 1)).join("\n");
};

/**
 * Full HTML document for the highlighted view of one paste. Burn-after-read
 * pastes get a notice instead of a raw link, which would already be dead.
 */
export function renderPastePage(record: PasteRecord, content: string): string {
  const { html, language } = highlight(content, record.language);
  const title = escapeHtml(record.title || record.id);
  const created = record.createdAt.toISOString().slice(0, 19);
  const expiry = record.expiresAt
    ? ` | Expires: ${record.expiresAt.toISOString().slice(0, 19)}`
    : "";
  const rawLink = record.burnAfterRead ? "" : ` |
      <a href="/${record.id}/raw">Raw</a>`;
  const notice = record.burnAfterRead
    ? `<div class="notice">This paste was deleted after this view.</div>`
    : "";

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${title} - Quick Paste</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="header">
    <h2>${title}</h2>
    <div class="meta">
      Language: ${escapeHtml(language)} |
      Created: ${created}${expiry}${rawLink}
    </div>
    ${notice}
  </div>
  <div class="paste">
    <pre class="gutter">${lineNumbers(content)}</pre>
    <pre><code class="hljs language-${escapeHtml(language)}">${html}</code></pre>
  </div>
</body>
</html>`;
}
