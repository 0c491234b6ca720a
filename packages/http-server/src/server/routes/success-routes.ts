/**
 * Confirmation page shown after a successful link
 */

import { Router, Request, Response } from 'express';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function renderSuccessPage(displayName: string | undefined): string {
  const account = displayName
    ? `<strong>${escapeHtml(displayName)}</strong>`
    : 'your account';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Account linked</title>
  <style>
    body { font-family: system-ui, sans-serif; max-width: 32rem; margin: 4rem auto; text-align: center; }
  </style>
</head>
<body>
  <h1>Account linked</h1>
  <p>Linked ${account}. You can close this window and return to Discord.</p>
</body>
</html>
`;
}

export function setupSuccessRoutes(router: Router, path = '/success'): void {
  router.get(path, (req: Request, res: Response) => {
    const displayName = typeof req.query.rbx === 'string' ? req.query.rbx : undefined;
    res.type('html').send(renderSuccessPage(displayName));
  });
}
