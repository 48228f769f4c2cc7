import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const CONFIG_FILE = '_config.yml';

export type MenuItem = { title: string; url: string };

export interface SiteConfig {
  title: string;
  tagline: string;
  description: string;
  author: string;
  url: string;
  /** '' or a path such as '/blog', without a trailing slash. */
  baseurl: string;
  /** Posts per index page. */
  paginate: number;
  relatedPosts: number;
  postsDir: string;
  destination: string;
  exclude: string[];
  menu: MenuItem[];
  portrait?: string;
  defaultLayout?: string;
}

// snake_case keys; anything not listed here is ignored.
export const siteConfigSchema = z.object({
  title: z.string().default('My Blog'),
  tagline: z.string().default(''),
  description: z.string().default(''),
  author: z.string().default(''),
  url: z.string().default(''),
  baseurl: z.string().default(''),
  paginate: z.number().int().positive().default(5),
  related_posts: z.number().int().nonnegative().default(3),
  posts_dir: z.string().min(1).default('_posts'),
  destination: z.string().min(1).default('_site'),
  exclude: z.array(z.string()).default([]),
  menu: z.array(z.object({ title: z.string(), url: z.string() })).default([]),
  portrait: z.string().optional(),
  defaults: z.object({ layout: z.string().min(1).optional() }).default({}),
});

export type RawSiteConfig = z.input<typeof siteConfigSchema>;

function normalizeBaseurl(baseurl: string): string {
  const trimmed = baseurl.trim().replace(/\/+$/, '');
  if (trimmed === '') return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export function resolveSiteConfig(raw: unknown, file = CONFIG_FILE): SiteConfig {
  const result = siteConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(file, details);
  }
  const data = result.data;
  return {
    title: data.title,
    tagline: data.tagline,
    description: data.description,
    author: data.author,
    url: data.url.replace(/\/+$/, ''),
    baseurl: normalizeBaseurl(data.baseurl),
    paginate: data.paginate,
    relatedPosts: data.related_posts,
    postsDir: data.posts_dir,
    destination: data.destination,
    exclude: data.exclude,
    menu: data.menu,
    portrait: data.portrait,
    defaultLayout: data.defaults.layout,
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads `_config.yml` from the site source. A missing default file yields the defaults;
 * a missing file that was asked for explicitly is an error.
 */
export async function loadSiteConfig(source: string, configFile?: string): Promise<SiteConfig> {
  const file = path.resolve(source, configFile ?? CONFIG_FILE);
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    if (configFile === undefined && isMissingFile(error)) return resolveSiteConfig({}, file);
    if (isMissingFile(error)) throw new ConfigError(file, 'file not found');
    throw error;
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigError(file, error instanceof Error ? error.message : String(error));
  }
  return resolveSiteConfig(raw, file);
}
