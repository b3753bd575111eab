import { minify } from "html-minifier-terser";
import { SealedPageError, describeError } from "../errors";

const OPTIONS = {
  collapseWhitespace: true,
  conservativeCollapse: false,
  removeComments: true,
  minifyCSS: true,
  minifyJS: true
};

export async function minifyHtml(html: string): Promise<string> {
  try {
    return await minify(html, OPTIONS);
  } catch (e) {
    throw new SealedPageError(`HTML minification failed: ${describeError(e)}`);
  }
}
