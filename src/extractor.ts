import * as cheerio from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";

// Subtrees a browser never renders as text.
const HIDDEN = "script, style, noscript, template, iframe";

function collectText(nodes: AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const text = node.data.trim();
      if (text) out.push(text);
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
}

/**
 * Visible text of a page: each non-blank text node trimmed, in document
 * order, joined by single newlines. Malformed markup parses best-effort.
 */
export function extractText(html: string): string {
  const $ = cheerio.load(html);
  $(HIDDEN).remove();

  const out: string[] = [];
  collectText($.root().toArray(), out);
  return out.join("\n");
}
