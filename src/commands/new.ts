import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import pc from 'picocolors';
import { loadSiteConfig } from '../lib/config.js';
import { isoDate } from '../lib/dates.js';
import { InvalidPostIdentifierError } from '../lib/errors.js';
import { stringifyFrontMatter } from '../lib/frontmatter.js';
import { createLogger } from '../lib/logger.js';
import { parsePostIdentifier, slugify } from '../lib/posts.js';
import type { FrontMatter } from '../types/post.js';
import { reportFailure } from './utils.js';

export type NewPostOptions = {
  date?: string;
  layout: string;
  keywords?: string;
  config?: string;
};

/** Builds the file name and contents of a fresh post; nothing is written. */
export function scaffoldPost(title: string, opts: NewPostOptions, today = new Date()): { fileName: string; contents: string } {
  const slug = slugify(title);
  if (!slug) throw new InvalidPostIdentifierError(title, 'the title has no characters usable in a slug');
  const fileName = `${opts.date ?? isoDate(today)}-${slug}.md`;
  parsePostIdentifier(fileName);

  const frontMatter: FrontMatter = { layout: opts.layout, title, description: '' };
  if (opts.keywords) {
    frontMatter.keywords = opts.keywords.split(',').map(k => k.trim()).filter(k => k.length > 0);
  }
  return { fileName, contents: stringifyFrontMatter(frontMatter, '\nWrite your post here.\n') };
}

export async function newCommand(title: string, source: string, opts: NewPostOptions) {
  const logger = createLogger();
  try {
    const config = await loadSiteConfig(source, opts.config);
    const { fileName, contents } = scaffoldPost(title, opts);
    const dir = path.resolve(source, config.postsDir);
    const target = path.join(dir, fileName);
    if (existsSync(target)) {
      logger.error(`Error: ${path.relative(process.cwd(), target)} already exists`);
      process.exitCode = 1;
      return;
    }
    await mkdir(dir, { recursive: true });
    await writeFile(target, contents, 'utf8');
    logger.success(`Created ${pc.bold(path.relative(process.cwd(), target))}`);
  } catch (error) {
    reportFailure(error, logger);
  }
}
