import { describe, it, expect } from 'vitest';
import { exportHtml, wrapHtmlBody } from './htmlExporter';
import { compilable, makeJob } from '../../testing/projectFixtures';

describe('exportHtml', () => {
  it('renders the manuscript body inside the page wrapper', () => {
    const output = exportHtml(makeJob([compilable('Opening', 'Hello *there*')])).toString('utf-8');

    expect(output.startsWith('<!doctype html>\n<html lang="en">')).toBe(true);
    expect(output).toContain('<title>The Book</title>');
    expect(output).toContain(
      '<body>\n' +
        '  <h1>The Book</h1>\n' +
        '  <div class="manuscript-author">by Jane Placeholder</div>\n' +
        '<h2 id="opening">Opening</h2>\n' +
        '<p>Hello <em>there</em></p>\n' +
        '</body>'
    );
  });

  it('links the table of contents to heading anchors', () => {
    const job = makeJob([compilable('Opening', 'Text')], { includeTableOfContents: true });
    const output = exportHtml(job).toString('utf-8');

    expect(output).toContain(
      '<h2 id="table-of-contents">Table of Contents</h2>\n' +
        '<ul>\n  <li><a href="#opening">Opening</a></li>\n</ul>\n' +
        '<hr/>\n' +
        '<h2 id="opening">Opening</h2>'
    );
  });
});

describe('wrapHtmlBody', () => {
  it('escapes the title and omits an empty author', () => {
    const page = wrapHtmlBody('<p>x</p>', 'Tom & Jerry', '');

    expect(page).toContain('<title>Tom &amp; Jerry</title>');
    expect(page).toContain('<body>\n  <h1>Tom &amp; Jerry</h1>\n<p>x</p>\n</body>');
    expect(page).not.toContain('manuscript-author">');
  });
});
