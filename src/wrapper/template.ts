import { SP_CONSTANTS } from "../constants";

export interface TemplateParts {
  title: string;       // already HTML-escaped
  style: string;       // already neutralised for <style>
  payloadJson: string; // already escaped for <script>
  runtime: string;
}

const BASE_STYLE = `
  html, body { height: 100%; margin: 0; }
  body { display: flex; align-items: center; justify-content: center;
         font-family: system-ui, -apple-system, "Segoe UI", sans-serif; background: #f4f5f7; color: #1f2328; }
  .sp-card { width: min(22rem, 90vw); padding: 2rem; border-radius: 0.75rem; background: #fff;
             box-shadow: 0 0.25rem 1.5rem rgba(0, 0, 0, 0.08); }
  .sp-card h1 { margin: 0 0 1rem; font-size: 1.25rem; }
  .sp-card input, .sp-card button { box-sizing: border-box; width: 100%; padding: 0.6rem; font-size: 1rem; }
  .sp-card button { margin-top: 0.75rem; cursor: pointer; }
  #sp-status { min-height: 1.5em; margin: 0.75rem 0 0; font-size: 0.9rem; color: #b42318; }
`;

export function renderTemplate(parts: TemplateParts): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <meta name="robots" content="noindex">
  <title>${parts.title}</title>
  <style>${BASE_STYLE}</style>
${parts.style ? `  <style>${parts.style}</style>\n` : ""}</head>
<body>
  <main class="sp-card">
    <h1>${parts.title}</h1>
    <noscript><p>This document is encrypted. JavaScript is required to open it.</p></noscript>
    <form id="sp-form" autocomplete="off">
      <label for="sp-password">Password</label>
      <input id="sp-password" name="password" type="password" required autofocus>
      <button id="sp-submit" type="submit">Open</button>
      <p id="sp-status" role="status" aria-live="polite"></p>
    </form>
  </main>
  <script id="${SP_CONSTANTS.PAYLOAD_ELEMENT_ID}" type="application/json">${parts.payloadJson}</script>
  <script>
${parts.runtime}
  </script>
</body>
</html>
`;
}
