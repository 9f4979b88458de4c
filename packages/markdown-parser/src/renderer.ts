import { visitBlock, type BlockNode } from "./ast";

export function renderBlocksToHtml(nodes: readonly BlockNode[]): string {
  return nodes.map(renderBlockToHtml).join("\n");
}

export function renderBlockToHtml(node: BlockNode): string {
  return visitBlock(node, {
    heading: n => `<h${n.level}>${escapeHtml(n.text)}</h${n.level}>`,
    paragraph: n => `<p>${escapeHtml(n.text)}</p>`,
    unorderedList: n => `<ul>${renderItems(n.items)}</ul>`,
    orderedList: n => `<ol>${renderItems(n.items)}</ol>`,
    codeBlock: n => {
      const lang = n.language ? ` class="language-${escapeHtmlAttr(n.language)}"` : "";
      return `<pre><code${lang}>${escapeHtml(n.code)}</code></pre>`;
    },
  });
}

function renderItems(items: readonly string[]): string {
  return items.map(item => `<li>${escapeHtml(item)}</li>`).join("");
}

export function escapeHtml(str: string) {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function escapeHtmlAttr(str: string) {
  return escapeHtml(str);
}

export function escapeUrl(str: string) {
  return str.replace(/"/g, "%22");
}

const SAFE_SCHEMES = new Set(["http", "https", "mailto", "file"]);

/**
 * Escapes a link target for an attribute, or returns null when its scheme
 * could run code (`javascript:`, `data:`, `vbscript:` ...). Relative targets pass.
 */
export function sanitizeUrl(url: string): string | null {
  // Browsers ignore control characters and spaces when reading the scheme.
  const compact = url.replace(/[\u0000-\u0020\u007F]/g, "");
  const scheme = compact.match(/^([a-z][a-z0-9+.-]*):/i);
  if (scheme && !SAFE_SCHEMES.has(scheme[1].toLowerCase())) return null;
  return escapeUrl(url);
}
