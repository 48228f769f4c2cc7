import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildSite, hasErrors } from './build.js';
import { ConfigError, DuplicateIdentifierError } from './errors.js';

function write(root: string, file: string, contents: string) {
  const target = join(root, file);
  mkdirSync(join(target, '..'), { recursive: true });
  writeFileSync(target, contents);
}

describe('buildSite', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'folio-site-'));
    write(root, '_config.yml', 'title: Test Blog\npaginate: 2\nmenu:\n  - title: About\n    url: /about/\n');
    write(root, '_posts/2016-01-01-first.md', '---\nlayout: post\ntitle: First\nkeywords: rust\n---\nFirst body\n');
    write(root, '_posts/2016-03-21-second.md', '---\nlayout: post\ntitle: Second\nkeywords: rust, web\n---\nIntro\n\n{% include video.html %}\n');
    write(root, '_posts/2016-11-11-third.md', '---\nlayout: post\ntitle: Third\n---\nThird body\n');
    write(root, '_posts/2016-05-05-broken.md', '---\nlayout: post\nnever closed\n');
    write(root, '_posts/2016-06-06-nolayout.md', '---\nlayout: gallery\ntitle: Pictures\n---\n');
    write(root, 'about.md', '---\nlayout: page\ntitle: About\n---\nAbout me\n');
    write(root, 'images/x.txt', 'x');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('renders every valid post, page and index page', async () => {
    const report = await buildSite({ source: root });

    expect(report.destination).toBe(join(root, '_site'));
    expect(report.written).toBe(true);
    expect(report.pages).toEqual([
      '2016/11/11/third/index.html',
      '2016/03/21/second/index.html',
      '2016/01/01/first/index.html',
      'about/index.html',
      'index.html',
      'page2/index.html',
    ]);
    expect(report.assets).toEqual(['images/x.txt', 'style.css']);
  });

  it('reports per-file problems without stopping', async () => {
    const report = await buildSite({ source: root });

    expect(hasErrors(report)).toBe(true);
    expect(report.diagnostics).toEqual([
      {
        file: join('_posts', '2016-05-05-broken.md'),
        severity: 'error',
        message: 'Front matter opened on line 1 is never closed',
        line: 1,
      },
      {
        file: join('_posts', '2016-06-06-nolayout.md'),
        severity: 'error',
        message: 'Unknown layout "gallery" (known: default, post, page, index)',
      },
      {
        file: join('_posts', '2016-03-21-second.md'),
        severity: 'warning',
        message: 'Unknown include "video.html"; left as text',
        line: 8,
        column: 1,
      },
    ]);
  });

  it('writes the generated files', async () => {
    const site = join(root, '_site');
    await buildSite({ source: root });

    const second = readFileSync(join(site, '2016', '03', '21', 'second', 'index.html'), 'utf8');
    expect(second).toContain('<div id="articleContent"><p>Intro</p>\n<p>{% include video.html %}</p></div>');
    expect(second).toContain('<a class="pagination-item older" href="/2016/01/01/first/">Older</a>');
    expect(second).toContain('<a class="pagination-item newer" href="/2016/11/11/third/">Newer</a>');
    expect(second).toContain('<ul class="related-posts"><li><h3><a href="/2016/01/01/first/">First <small>01 Jan 2016</small></a></h3></li></ul>');

    const index = readFileSync(join(site, 'index.html'), 'utf8');
    expect(index).toContain('<a href="/2016/11/11/third/">Third</a>');
    expect(index).toContain('<a href="/2016/03/21/second/">Second</a>');
    expect(index).toContain('<a class="pagination-item older" href="/page2/">Older</a>');

    const pageTwo = readFileSync(join(site, 'page2', 'index.html'), 'utf8');
    expect(pageTwo).toContain('<title>Page 2 · Test Blog</title>');
    expect(pageTwo).toContain('<a href="/2016/01/01/first/">First</a>');

    expect(readFileSync(join(site, 'about', 'index.html'), 'utf8')).toContain('<h1 class="page-title">About</h1>');
    expect(readFileSync(join(site, 'images', 'x.txt'), 'utf8')).toBe('x');
    expect(readFileSync(join(site, 'style.css'), 'utf8')).toContain('.pagination-item');
    expect(existsSync(join(site, '2016', '06', '06', 'nolayout'))).toBe(false);
  });

  it('leaves posts with an unknown layout out of every listing', async () => {
    const site = join(root, '_site');
    const report = await buildSite({ source: root });

    for (const page of report.pages) {
      expect(readFileSync(join(site, page), 'utf8')).not.toContain('/2016/06/06/nolayout/');
    }
    const third = readFileSync(join(site, '2016', '11', '11', 'third', 'index.html'), 'utf8');
    expect(third).toContain('<a class="pagination-item older" href="/2016/03/21/second/">Older</a>');
  });

  it('still fails on a duplicate whose twin has an unknown layout', async () => {
    write(root, '_posts/2016-06-06-nolayout.markdown', '---\nlayout: post\n---\n');
    await expect(buildSite({ source: root, write: false })).rejects.toBeInstanceOf(DuplicateIdentifierError);
  });

  it('clears stale output from an earlier build', async () => {
    write(root, '_site/stale.html', 'old');
    await buildSite({ source: root });
    expect(existsSync(join(root, '_site', 'stale.html'))).toBe(false);
  });

  it('keeps a stylesheet the site ships', async () => {
    write(root, 'style.css', 'body { color: red; }\n');
    const report = await buildSite({ source: root });
    expect(report.assets).toEqual(['images/x.txt', 'style.css']);
    expect(readFileSync(join(root, '_site', 'style.css'), 'utf8')).toBe('body { color: red; }\n');
  });

  it('touches nothing when write is false', async () => {
    const report = await buildSite({ source: root, write: false });
    expect(report.written).toBe(false);
    expect(report.pages).toHaveLength(6);
    expect(existsSync(join(root, '_site'))).toBe(false);
  });

  it('honours a destination override', async () => {
    const report = await buildSite({ source: root, destination: 'public' });
    expect(report.destination).toBe(join(root, 'public'));
    expect(existsSync(join(root, 'public', 'index.html'))).toBe(true);
  });

  it('rejects a destination that contains the source', async () => {
    await expect(buildSite({ source: root, destination: '..', write: false })).rejects.toBeInstanceOf(ConfigError);
  });

  it('fails before writing when two posts share an identifier', async () => {
    write(root, '_posts/2016-01-01-first.markdown', '---\nlayout: post\n---\nAgain\n');
    await expect(buildSite({ source: root })).rejects.toBeInstanceOf(DuplicateIdentifierError);
    expect(existsSync(join(root, '_site'))).toBe(false);
  });

  it('writes a single index page for a site without posts', async () => {
    rmSync(join(root, '_posts'), { recursive: true });
    const report = await buildSite({ source: root, write: false });
    expect(report.pages).toEqual(['about/index.html', 'index.html']);
    expect(report.diagnostics).toEqual([]);
  });
});
