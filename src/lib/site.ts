import type { SiteConfig } from './config.js';
import type { PostCollection } from './collection.js';
import type { Page } from '../types/post.js';

/**
 * Everything a layout may read about the site. Built once after all posts are parsed
 * and handed to every layout; nothing mutates it afterwards.
 */
export type SiteContext = Readonly<{
  config: Readonly<SiteConfig>;
  posts: PostCollection;
  pages: readonly Page[];
  time: Date;
}>;

export function createSiteContext(config: SiteConfig, posts: PostCollection, pages: Page[] = [], time = new Date()): SiteContext {
  return Object.freeze({
    config: Object.freeze({ ...config }),
    posts,
    pages: Object.freeze([...pages]),
    time,
  });
}
