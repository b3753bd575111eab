import { escapeStyle } from "./html";

/**
 * Adds `css` to a document in a `<style>` element: before `</head>`, else
 * right after the `<html>` start tag, else at the very start.
 */
export function injectStyle(html: string, css: string): string {
  if (!css) return html;
  const tag = `<style>${escapeStyle(css)}</style>`;

  const head = /<\/head\s*>/i.exec(html);
  if (head) {
    return html.slice(0, head.index) + tag + html.slice(head.index);
  }
  const root = /<html\b[^>]*>/i.exec(html);
  if (root) {
    const end = root.index + root[0].length;
    return html.slice(0, end) + tag + html.slice(end);
  }
  return tag + html;
}
