import hljs from "highlight.js";
import { DEFAULT_LANGUAGE } from "../storage/index-store";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (text: string): string =>
  text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);

export interface Highlighted {
  /** Markup for the inside of `<code>`. */
  html: string;
  /** Language actually used; `plaintext` when the tag was unknown. */
  language: string;
}

/**
 * Highlight `content` for `language`. Unknown tags (and `plaintext`) come
 * back as escaped text, never as an error.
 */
export function highlight(content: string, language: string): Highlighted {
  const tag = language.trim().toLowerCase();
  const grammar = tag && tag !== DEFAULT_LANGUAGE ? hljs.getLanguage(tag) : undefined;
  if (!grammar) {
    return { html: escapeHtml(content), language: DEFAULT_LANGUAGE };
  }

  const result = hljs.highlight(content, { language: tag, ignoreIllegals: true });
  return { html: result.value, language: tag };
}

