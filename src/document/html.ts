const ENTITY_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

const ENTITY_UNESCAPES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " "
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (c) => ENTITY_ESCAPES[c] ?? c);
}

export function unescapeHtml(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39|nbsp);/g, (e) => ENTITY_UNESCAPES[e] ?? e);
}

/** Keeps style text from terminating its `<style>` element. */
export function escapeStyle(css: string): string {
  return css.replace(/<\/(style)/gi, "<\\/$1");
}
