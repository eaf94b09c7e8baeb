/**
 * Minimal HTML pages for the browser-facing auth endpoints
 */

const STYLE = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 600px; margin: 50px auto; padding: 20px; }
  .box { background: #f3f4f6; padding: 15px; border-radius: 8px; margin: 20px 0; }
  .btn { display: inline-block; background: #3b82f6; color: white; padding: 10px 20px; border-radius: 6px; text-decoration: none; margin-top: 20px; margin-right: 10px; }
  .btn:hover { background: #2563eb; }
  code { background: #f3f4f6; padding: 2px 8px; border-radius: 4px; }
`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Wrap trusted body markup in a page. Interpolated values must already be
 * escaped.
 */
export function renderPage(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <title>${escapeHtml(title)} - Workspace Agent Gateway</title>
  <style>${STYLE}</style>
</head>
<body>
  <h1>${escapeHtml(title)}</h1>
  ${body}
</body>
</html>`;
}

export function signInAgainPage(): string {
  return renderPage(
    'Please Sign In Again',
    `<div class="box">Your sign-in could not be completed. The sign-in link may have
      expired or already been used.</div>
    <a href="/auth/login" class="btn">Sign in again</a>
    <a href="/" class="btn">← Back to Home</a>`
  );
}
