import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadSiteConfig, resolveSiteConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('resolveSiteConfig', () => {
  it('fills in defaults', () => {
    expect(resolveSiteConfig({})).toEqual({
      title: 'My Blog',
      tagline: '',
      description: '',
      author: '',
      url: '',
      baseurl: '',
      paginate: 5,
      relatedPosts: 3,
      postsDir: '_posts',
      destination: '_site',
      exclude: [],
      menu: [],
      portrait: undefined,
      defaultLayout: undefined,
    });
  });

  it('maps snake_case keys', () => {
    const config = resolveSiteConfig({ related_posts: 0, posts_dir: 'writing', defaults: { layout: 'post' } });
    expect(config.relatedPosts).toBe(0);
    expect(config.postsDir).toBe('writing');
    expect(config.defaultLayout).toBe('post');
  });

  it('normalizes the base url', () => {
    expect(resolveSiteConfig({ baseurl: 'blog/' }).baseurl).toBe('/blog');
    expect(resolveSiteConfig({ baseurl: '/' }).baseurl).toBe('');
    expect(resolveSiteConfig({ url: 'https://example.com/' }).url).toBe('https://example.com');
  });

  it('reports every invalid key', () => {
    expect(() => resolveSiteConfig({ paginate: 0 }, 'site.yml')).toThrow(ConfigError);
    try {
      resolveSiteConfig({ paginate: 0, menu: [{ title: 'About' }] }, 'site.yml');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: 'CONFIG', file: 'site.yml' });
      expect(String(error)).toContain('Invalid site configuration in site.yml: paginate: ');
      expect(String(error)).toContain('; menu.0.url: Required');
    }
  });
});

describe('loadSiteConfig', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'folio-config-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('reads _config.yml', async () => {
    writeFileSync(
      join(root, '_config.yml'),
      'title: Notes\npaginate: 2\nmenu:\n  - title: About\n    url: /about/\nexclude:\n  - README.md\n',
    );
    const config = await loadSiteConfig(root);
    expect(config).toMatchObject({
      title: 'Notes',
      paginate: 2,
      menu: [{ title: 'About', url: '/about/' }],
      exclude: ['README.md'],
    });
  });

  it('uses defaults when there is no config file', async () => {
    expect((await loadSiteConfig(root)).title).toBe('My Blog');
  });

  it('treats an empty file as all defaults', async () => {
    writeFileSync(join(root, '_config.yml'), '');
    expect((await loadSiteConfig(root)).paginate).toBe(5);
  });

  it('fails for a missing file named explicitly', async () => {
    await expect(loadSiteConfig(root, 'other.yml')).rejects.toThrow(
      `Invalid site configuration in ${join(root, 'other.yml')}: file not found`,
    );
  });

  it('fails for invalid yaml', async () => {
    writeFileSync(join(root, '_config.yml'), 'title: [unclosed\n');
    await expect(loadSiteConfig(root)).rejects.toBeInstanceOf(ConfigError);
  });
});
