import { copyFile, mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { assertUniqueIdentifiers, PostCollection } from './collection.js';
import { loadSiteConfig, type SiteConfig } from './config.js';
import { errorDiagnostic, messageDiagnostic } from './diagnostics.js';
import { ConfigError, FolioError, UnknownLayoutError } from './errors.js';
import { hasFrontMatter } from './frontmatter.js';
import { composeLayout, createLayoutRegistry, resolveLayout, type ComposeInput, type LayoutRegistry } from './layouts.js';
import { silentLogger, type Logger } from './logger.js';
import { renderMarkdown } from './markdown.js';
import { isMarkdownFile, loadPages, loadPosts } from './posts.js';
import { createIncludeRegistry, type IncludeRegistry } from './remark-include.js';
import { indexPageUrl, outputPath } from './routes.js';
import { createSiteContext, type SiteContext } from './site.js';
import type { Diagnostic, FrontMatter, Post } from '../types/post.js';

const STYLESHEET = 'style.css';
const BUNDLED_STYLESHEET = fileURLToPath(new URL('../../assets/style.css', import.meta.url));

export type BuildOptions = {
  source: string;
  /** Overrides `destination` from the site config; relative to the source. */
  destination?: string;
  configFile?: string;
  /** When false everything is rendered but nothing touches the disk. */
  write?: boolean;
  logger?: Logger;
  layouts?: LayoutRegistry;
  includes?: IncludeRegistry;
  time?: Date;
};

export type OutputFile = {
  /** Relative to the destination. */
  path: string;
  contents: string;
};

export type BuildReport = {
  destination: string;
  /** Generated HTML files, relative to the destination. */
  pages: string[];
  /** Static files copied from the source (or the bundled stylesheet), relative to the destination. */
  assets: string[];
  diagnostics: Diagnostic[];
  written: boolean;
};

export function hasErrors(report: Pick<BuildReport, 'diagnostics'>): boolean {
  return report.diagnostics.some(d => d.severity === 'error');
}

type Rendered = {
  output?: OutputFile;
  diagnostics: Diagnostic[];
};

type Entry = {
  file: string;
  body: string;
  frontMatter: FrontMatter;
  bodyOffset: number;
};

function isInside(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

function compose(file: string, layouts: LayoutRegistry, input: ComposeInput, site: SiteContext, url: string): Rendered {
  try {
    return { output: { path: outputPath(site.config.baseurl, url), contents: composeLayout(layouts, input) }, diagnostics: [] };
  } catch (error) {
    if (error instanceof FolioError) return { diagnostics: [errorDiagnostic(file, error)] };
    throw error;
  }
}

async function renderEntry(
  entry: Entry,
  context: { source: string; includes: IncludeRegistry },
): Promise<{ html: string; diagnostics: Diagnostic[] }> {
  const { html, warnings } = await renderMarkdown(entry.body, {
    frontMatter: entry.frontMatter,
    path: entry.file,
    root: context.source,
    includes: context.includes,
  });
  return { html, diagnostics: warnings.map(w => messageDiagnostic(entry.file, w, entry.bodyOffset)) };
}

function renderIndexPages(site: SiteContext, layouts: LayoutRegistry): Rendered[] {
  const { config, posts } = site;
  if (posts.size === 0) {
    const url = indexPageUrl(config.baseurl, 1);
    return [compose('index.html', layouts, { body: '', frontMatter: { layout: 'index' }, site, page: { url } }, site, url)];
  }
  return [...posts.paginate(config.paginate)].map(paginator => {
    const url = indexPageUrl(config.baseurl, paginator.index);
    const frontMatter: FrontMatter = paginator.index === 1
      ? { layout: 'index' }
      : { layout: 'index', title: `Page ${paginator.index}` };
    return compose(outputPath(config.baseurl, url), layouts, { body: '', frontMatter, site, page: { url, paginator } }, site, url);
  });
}

async function collectStaticFiles(source: string, destination: string, config: SiteConfig, dir = source): Promise<string[]> {
  const found: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    const relative = path.relative(source, full);
    if (/^[_.]/.test(entry.name) || entry.name === 'node_modules') continue;
    if (config.exclude.includes(relative) || config.exclude.includes(entry.name)) continue;
    if (isInside(destination, full)) continue;
    if (entry.isDirectory()) {
      found.push(...await collectStaticFiles(source, destination, config, full));
    } else if (entry.isFile()) {
      // Markdown with front matter is a page; without it the file is copied as is.
      if (isMarkdownFile(entry.name) && dir === source && hasFrontMatter(await readFile(full, 'utf8'))) continue;
      found.push(relative);
    }
  }
  return found.sort();
}

/**
 * Generates the whole site. Per-file problems are collected into the report and the file
 * is skipped; configuration errors and duplicate post identifiers throw before anything
 * is written.
 */
export async function buildSite(options: BuildOptions): Promise<BuildReport> {
  const source = path.resolve(options.source);
  const logger = options.logger ?? silentLogger;
  const layouts = options.layouts ?? createLayoutRegistry();
  const includes = options.includes ?? createIncludeRegistry();

  const config = await loadSiteConfig(source, options.configFile);
  const destination = path.resolve(source, options.destination ?? config.destination);
  if (isInside(destination, source)) {
    throw new ConfigError(destination, 'destination must not contain the site source');
  }
  logger.debug(`Source: ${source}`);
  logger.debug(`Destination: ${destination}`);

  const [posts, pages] = await Promise.all([
    loadPosts(path.join(source, config.postsDir), { baseurl: config.baseurl, root: source }),
    loadPages(source, { baseurl: config.baseurl, exclude: config.exclude }),
  ]);
  const diagnostics: Diagnostic[] = [...posts.diagnostics, ...pages.diagnostics];

  // Duplicates are fatal even when one of the pair would be skipped below.
  assertUniqueIdentifiers(posts.items);
  const publishable: Post[] = [];
  for (const post of posts.items) {
    try {
      resolveLayout(layouts, post.frontMatter, config.defaultLayout);
      publishable.push(post);
    } catch (error) {
      if (!(error instanceof UnknownLayoutError)) throw error;
      diagnostics.push(errorDiagnostic(path.relative(source, post.sourcePath), error));
    }
  }

  // Join point: ordering, neighbors and related posts need every publishable post parsed first.
  const collection = new PostCollection(publishable);
  const site = createSiteContext(config, collection, pages.items, options.time);
  logger.debug(`Loaded ${collection.size} posts and ${pages.items.length} pages`);

  const context = { source, includes };
  const renderedPosts = await Promise.all(collection.all().map(async (post): Promise<Rendered> => {
    const file = path.relative(source, post.sourcePath);
    const { html, diagnostics: warnings } = await renderEntry({ ...post, file }, context);
    const page = {
      url: post.url,
      post,
      neighbors: collection.neighbors(post),
      related: collection.related(post, config.relatedPosts),
    };
    const composed = compose(file, layouts, { body: html, frontMatter: post.frontMatter, site, page, date: post.date }, site, post.url);
    return { output: composed.output, diagnostics: [...warnings, ...composed.diagnostics] };
  }));
  const renderedPages = await Promise.all(pages.items.map(async (entry): Promise<Rendered> => {
    const file = path.relative(source, entry.sourcePath);
    const { html, diagnostics: warnings } = await renderEntry({ ...entry, file }, context);
    const composed = compose(file, layouts, { body: html, frontMatter: entry.frontMatter, site, page: { url: entry.url } }, site, entry.url);
    return { output: composed.output, diagnostics: [...warnings, ...composed.diagnostics] };
  }));

  const outputs: OutputFile[] = [];
  for (const rendered of [...renderedPosts, ...renderedPages, ...renderIndexPages(site, layouts)]) {
    diagnostics.push(...rendered.diagnostics);
    if (rendered.output) outputs.push(rendered.output);
  }

  const assets = await collectStaticFiles(source, destination, config);
  const bundleStylesheet = !assets.includes(STYLESHEET);

  const write = options.write ?? true;
  if (write) {
    await rm(destination, { recursive: true, force: true });
    for (const output of outputs) {
      const target = path.join(destination, output.path);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, output.contents, 'utf8');
      logger.debug(`Wrote ${output.path}`);
    }
    for (const asset of assets) {
      const target = path.join(destination, asset);
      await mkdir(path.dirname(target), { recursive: true });
      await copyFile(path.join(source, asset), target);
    }
    if (bundleStylesheet) {
      await mkdir(destination, { recursive: true });
      await copyFile(BUNDLED_STYLESHEET, path.join(destination, STYLESHEET));
    }
  }

  return {
    destination,
    pages: outputs.map(o => o.path),
    assets: bundleStylesheet ? [...assets, STYLESHEET] : assets,
    diagnostics,
    written: write,
  };
}
