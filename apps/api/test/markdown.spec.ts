import { describe, it, expect } from 'vitest';
import { renderMarkdown } from '../src/core/markdown';

describe('renderMarkdown', () => {
  it('renders headings and paragraphs', () => {
    const html = renderMarkdown('# Program\n\nMusic all day.');

    expect(html).toContain('<h1>Program</h1>');
    expect(html).toContain('<p>Music all day.</p>');
  });

  it('turns single newlines into <br>', () => {
    expect(renderMarkdown('line one\nline two')).toContain('<p>line one<br>line two</p>');
  });

  it('renders tables', () => {
    const html = renderMarkdown('| stage | time |\n| --- | --- |\n| A | 10:00 |');

    expect(html).toContain('<th>stage</th>');
    expect(html).toContain('<td>10:00</td>');
  });

  it('keeps links and images', () => {
    const html = renderMarkdown('[map](https://maps.test/x) ![logo](https://img.test/logo.png)');

    expect(html).toContain('<a href="https://maps.test/x">map</a>');
    expect(html).toContain('<img src="https://img.test/logo.png" alt="logo">');
  });

  it('drops scripts and event handlers', () => {
    const html = renderMarkdown(
      'ok\n\n<script>alert(1)</script>\n\n<a href="javascript:alert(2)" onclick="x()">bad</a>'
    );

    expect(html).not.toContain('<script');
    expect(html).not.toContain('onclick');
    expect(html).not.toContain('javascript:');
    expect(html).toContain('<p>ok</p>');
  });
});
