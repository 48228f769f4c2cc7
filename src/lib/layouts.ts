import { createElement, type ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import DefaultLayout from '../components/DefaultLayout.js';
import IndexLayout from '../components/IndexLayout.js';
import PageLayout from '../components/PageLayout.js';
import PostLayout from '../components/PostLayout.js';
import { UnknownLayoutError } from './errors.js';
import { frontMatterString } from './frontmatter.js';
import { formatPostDate } from './dates.js';
import type { Neighbors, PostPage } from './collection.js';
import type { SiteContext } from './site.js';
import type { FrontMatter, Post } from '../types/post.js';

export type LayoutSlots = {
  title: string;
  body: string; // rendered HTML
  date: string;
  description: string;
};

export type PageContext = {
  url: string;
  post?: Post;
  neighbors?: Neighbors;
  related?: Post[];
  paginator?: PostPage;
};

export type LayoutProps = {
  slots: LayoutSlots;
  frontMatter: FrontMatter;
  site: SiteContext;
  page: PageContext;
};

export type LayoutComponent = (props: LayoutProps) => ReactElement;

export type LayoutRegistry = ReadonlyMap<string, LayoutComponent>;

export function createLayoutRegistry(extra: Record<string, LayoutComponent> = {}): LayoutRegistry {
  return new Map<string, LayoutComponent>([
    ['default', DefaultLayout],
    ['post', PostLayout],
    ['page', PageLayout],
    ['index', IndexLayout],
    ...Object.entries(extra),
  ]);
}

export type ComposeInput = {
  body: string;
  frontMatter: FrontMatter;
  site: SiteContext;
  page: PageContext;
  /** Publication date of a post; pages fall back to a `date` front-matter value. */
  date?: Date;
};

/** The layout named by `frontMatter.layout`, else `defaultLayout`; throws when neither is registered. */
export function resolveLayout(registry: LayoutRegistry, frontMatter: FrontMatter, defaultLayout?: string): LayoutComponent {
  const name = frontMatterString(frontMatter, 'layout') || defaultLayout;
  const Layout = name === undefined ? undefined : registry.get(name);
  if (!Layout) throw new UnknownLayoutError(name, [...registry.keys()]);
  return Layout;
}

/**
 * Wraps rendered HTML in the layout named by `frontMatter.layout` (or the site's default
 * layout). Slots without a front-matter value render empty.
 */
export function composeLayout(registry: LayoutRegistry, input: ComposeInput): string {
  const { frontMatter, site, page } = input;
  const Layout = resolveLayout(registry, frontMatter, site.config.defaultLayout);

  const slots: LayoutSlots = {
    title: frontMatterString(frontMatter, 'title') ?? '',
    body: input.body,
    date: input.date ? formatPostDate(input.date) : frontMatterString(frontMatter, 'date') ?? '',
    description: frontMatterString(frontMatter, 'description') ?? '',
  };
  return `<!DOCTYPE html>${renderToStaticMarkup(createElement(Layout, { slots, frontMatter, site, page }))}`;
}
