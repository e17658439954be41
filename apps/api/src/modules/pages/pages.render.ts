import type { PublicEvent } from '@flyerqr/types';

const PAGE_CSS = `
body{margin:0;font:16px/1.5 system-ui,sans-serif;color:#111;background:#fff}
main{max-width:40rem;margin:0 auto;padding:1rem}
h1{font-size:1.6rem;line-height:1.2}
img{max-width:100%;height:auto}
table{border-collapse:collapse}td,th{border:1px solid #ccc;padding:.25rem .5rem}
footer{margin-top:2rem;color:#666;font-size:.85rem}
`.trim();

export function escapeHtml(value: string) {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

// 2024-05-01T10:30:00.000Z -> 2024-05-01 10:30 UTC
export function formatUpdatedAt(iso: string) {
  return `${iso.slice(0, 16).replace('T', ' ')} UTC`;
}

function layout(title: string, body: string) {
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)}</title>
<style>${PAGE_CSS}</style>
</head>
<body>
<main>
${body}
</main>
</body>
</html>
`;
}

/** `contentHtml` ya viene sanitizado desde renderMarkdown. */
export function renderEventPage(event: PublicEvent, contentHtml: string) {
  return layout(
    event.title,
    `<h1>${escapeHtml(event.title)}</h1>
<article>
${contentHtml}
</article>
<footer>Updated <time datetime="${escapeHtml(event.updatedAt)}">${escapeHtml(
      formatUpdatedAt(event.updatedAt)
    )}</time></footer>`
  );
}

export function renderNotFoundPage() {
  return layout(
    'Event not found',
    `<h1>Event not found</h1>
<p>This event does not exist or is no longer public.</p>`
  );
}
