import { SP_CONSTANTS } from "../constants";
import { unescapeHtml } from "./html";

const TITLE_RE = /<title\b[^>]*>([\s\S]*?)<\/title>/i;
const H1_RE = /<h1\b[^>]*>([\s\S]*?)<\/h1>/i;

function textOf(fragment: string): string {
  return unescapeHtml(fragment.replace(/<[^>]*>/g, "")).replace(/\s+/g, " ").trim();
}

/** `<title>` text, else the first `<h1>`, else `fallback`. */
export function extractTitle(html: string, fallback: string = SP_CONSTANTS.DEFAULT_TITLE): string {
  for (const re of [TITLE_RE, H1_RE]) {
    const match = re.exec(html);
    const text = match ? textOf(match[1] ?? "") : "";
    if (text) return text;
  }
  return fallback;
}
