import { Marked } from "marked";
import { extractTitle } from "./title";
import { escapeHtml, escapeStyle } from "./html";

export interface RenderMarkdownOptions {
  style?: string;
  /** Overrides the title taken from the first heading. */
  title?: string;
}

const marked = new Marked({ gfm: true });

/** Renders Markdown (GFM, tables included) into a standalone HTML document. */
export async function renderMarkdown(markdown: string, opts: RenderMarkdownOptions = {}): Promise<string> {
  const body = await marked.parse(markdown);
  const title = opts.title ?? extractTitle(body);
  const styleTag = opts.style ? `  <style>${escapeStyle(opts.style)}</style>\n` : "";

  return (
    "<!DOCTYPE html>\n" +
    '<html lang="en">\n' +
    "<head>\n" +
    '  <meta charset="utf-8">\n' +
    '  <meta name="viewport" content="width=device-width, initial-scale=1">\n' +
    `  <title>${escapeHtml(title)}</title>\n` +
    styleTag +
    "</head>\n" +
    "<body>\n" +
    `${body}\n` +
    "</body>\n" +
    "</html>\n"
  );
}
