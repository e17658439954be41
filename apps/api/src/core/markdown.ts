import { Marked } from 'marked';
import DOMPurify from 'isomorphic-dompurify';

// GFM + tablas + saltos de línea como <br>
const marked = new Marked({ gfm: true, breaks: true });

export function renderMarkdown(source: string): string {
  const html = marked.parse(source);

  if (typeof html !== 'string') {
    throw new Error('Markdown renderer returned a promise');
  }

  // El contenido lo escribe cualquiera con el link de edición
  return DOMPurify.sanitize(html);
}
