import { escapeHtml } from '../lib/html';

const NAV_LINKS = [
    { href: '/', label: 'Dashboard' },
    { href: '/jobs', label: 'Jobs' },
    { href: '/add-job', label: 'Add Job' },
];

export function renderLayout(title: string, body: string): string {
    const nav = NAV_LINKS.map((link) => `<a href="${link.href}">${escapeHtml(link.label)}</a>`).join(
        '\n        ',
    );

    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)} | Job Tracker</title>
  <style>
    body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; color: #333; margin: 0; }
    header { background: #5a6977; padding: 12px 24px; }
    header a { color: white; margin-right: 16px; text-decoration: none; }
    main { padding: 24px; max-width: 960px; }
    table { border-collapse: collapse; width: 100%; }
    th, td { text-align: left; padding: 6px 8px; border-bottom: 1px solid #ddd; }
    .field { margin-bottom: 12px; }
    .field label { display: block; font-weight: 600; }
    .field.has-error input, .field.has-error select, .field.has-error textarea { border-color: #c0392b; }
    .error { color: #c0392b; font-size: 13px; }
    .filters a { margin-right: 10px; }
    .filters a.active { font-weight: 700; }
  </style>
</head>
<body>
  <header>
    <nav>
        ${nav}
    </nav>
  </header>
  <main>
    <h1>${escapeHtml(title)}</h1>
${body}
  </main>
</body>
</html>`;
}
