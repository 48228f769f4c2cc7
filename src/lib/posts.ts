import { existsSync } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { frontMatterString, hasFrontMatter, parseFrontMatter } from './frontmatter.js';
import { FolioError, InvalidPostIdentifierError } from './errors.js';
import { errorDiagnostic, warningDiagnostic } from './diagnostics.js';
import type { Diagnostic, Page, Post } from '../types/post.js';

const POST_NAME = /^(\d{4})-(\d{2})-(\d{2})-(.+)$/;
const MARKDOWN = /\.(md|markdown)$/;

export type PostIdentifier = {
  identifier: string;
  slug: string;
  date: Date;
};

export type LoadResult<T> = {
  items: T[];
  diagnostics: Diagnostic[];
};

export function isMarkdownFile(fileName: string): boolean {
  return MARKDOWN.test(fileName);
}

export function hasDatePrefix(fileName: string): boolean {
  return POST_NAME.test(fileName.replace(MARKDOWN, ''));
}

/** `2016-03-21-hello-world.md` → identifier `2016-03-21-hello-world`, slug `hello-world`. */
export function parsePostIdentifier(fileName: string): PostIdentifier {
  const identifier = path.basename(fileName).replace(MARKDOWN, '');
  const match = POST_NAME.exec(identifier);
  if (!match) throw new InvalidPostIdentifierError(identifier, 'expected YYYY-MM-DD-slug');

  const [, year, month, day, slug] = match;
  // setUTCFullYear, unlike Date.UTC, keeps years 0-99 as written.
  const date = new Date(0);
  date.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  const valid = date.getUTCFullYear() === Number(year)
    && date.getUTCMonth() === Number(month) - 1
    && date.getUTCDate() === Number(day);
  if (!valid) throw new InvalidPostIdentifierError(identifier, `${year}-${month}-${day} is not a calendar date`);

  return { identifier, slug, date };
}

export function postUrl(baseurl: string, { date, slug }: Pick<PostIdentifier, 'date' | 'slug'>): string {
  const yyyy = String(date.getUTCFullYear()).padStart(4, '0');
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  return `${baseurl}/${yyyy}/${mm}/${dd}/${slug}/`;
}

export function slugify(title: string): string {
  return title
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function postTitle(post: Post): string {
  return frontMatterString(post.frontMatter, 'title') || post.slug;
}

export async function readPost(filePath: string, baseurl: string): Promise<Post> {
  const id = parsePostIdentifier(filePath);
  const raw = await readFile(filePath, 'utf8');
  const { frontMatter, body, bodyOffset } = parseFrontMatter(raw);
  return {
    ...id,
    frontMatter,
    body,
    bodyOffset,
    url: postUrl(baseurl, id),
    sourcePath: filePath,
  };
}

export function pageFromText(filePath: string, raw: string, baseurl: string): Page {
  const name = path.basename(filePath).replace(MARKDOWN, '');
  const { frontMatter, body, bodyOffset } = parseFrontMatter(raw);
  return { name, frontMatter, body, bodyOffset, url: `${baseurl}/${name}/`, sourcePath: filePath };
}

// Content errors become diagnostics for that file; anything else (I/O) ends the run.
async function settle<T>(file: string, load: () => Promise<T>): Promise<T | Diagnostic> {
  try {
    return await load();
  } catch (error) {
    if (error instanceof FolioError) return errorDiagnostic(file, error);
    throw error;
  }
}

function isDiagnostic<T extends object>(value: T | Diagnostic): value is Diagnostic {
  return 'severity' in value;
}

/**
 * Reads every Markdown post in `dir`. Files without a date prefix are skipped with a
 * warning; malformed ones become error diagnostics and the rest still load.
 */
export async function loadPosts(dir: string, options: { baseurl: string; root?: string }): Promise<LoadResult<Post>> {
  if (!existsSync(dir)) return { items: [], diagnostics: [] };
  const root = options.root ?? dir;
  const files = (await readdir(dir)).filter(isMarkdownFile).sort();

  const diagnostics: Diagnostic[] = [];
  const candidates: string[] = [];
  for (const f of files) {
    if (hasDatePrefix(f)) candidates.push(f);
    else diagnostics.push(warningDiagnostic(path.relative(root, path.join(dir, f)), 'Skipped: post file names must start with YYYY-MM-DD-'));
  }

  const results = await Promise.all(candidates.map(f => {
    const filePath = path.join(dir, f);
    return settle(path.relative(root, filePath), () => readPost(filePath, options.baseurl));
  }));

  const items: Post[] = [];
  for (const result of results) {
    if (isDiagnostic(result)) diagnostics.push(result);
    else items.push(result);
  }
  return { items, diagnostics };
}

/**
 * Top-level Markdown files that open with front matter are pages. Files without front
 * matter are treated as static files by the build.
 */
export async function loadPages(source: string, options: { baseurl: string; exclude: string[] }): Promise<LoadResult<Page>> {
  const entries = await readdir(source, { withFileTypes: true });
  const diagnostics: Diagnostic[] = [];
  const items: Page[] = [];

  for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : 1))) {
    if (!entry.isFile() || !isMarkdownFile(entry.name) || /^[_.]/.test(entry.name)) continue;
    if (options.exclude.includes(entry.name)) continue;
    const raw = await readFile(path.join(source, entry.name), 'utf8');
    if (!hasFrontMatter(raw)) continue;
    if (entry.name.replace(MARKDOWN, '') === 'index') {
      diagnostics.push({ file: entry.name, severity: 'error', message: 'index pages are generated from the post listing; rename this page' });
      continue;
    }
    const result = await settle(entry.name, async () => pageFromText(path.join(source, entry.name), raw, options.baseurl));
    if (isDiagnostic(result)) diagnostics.push(result);
    else items.push(result);
  }
  return { items, diagnostics };
}
