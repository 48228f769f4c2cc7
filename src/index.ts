export { buildSite, hasErrors, type BuildOptions, type BuildReport, type OutputFile } from './lib/build.js';
export { PostCollection, assertUniqueIdentifiers, comparePosts, relatedTokens, type Neighbors, type PostPage } from './lib/collection.js';
export { loadSiteConfig, resolveSiteConfig, type MenuItem, type SiteConfig } from './lib/config.js';
export { formatDiagnostic } from './lib/diagnostics.js';
export * from './lib/errors.js';
export {
  frontMatterList,
  frontMatterString,
  parseFrontMatter,
  stringifyFrontMatter,
  type ParsedContent,
} from './lib/frontmatter.js';
export {
  composeLayout,
  createLayoutRegistry,
  resolveLayout,
  type LayoutComponent,
  type LayoutProps,
  type LayoutRegistry,
  type LayoutSlots,
  type PageContext,
} from './lib/layouts.js';
export { createLogger, silentLogger, type Logger } from './lib/logger.js';
export { getMarkdownOptions, renderMarkdown, type RenderOptions, type RenderResult } from './lib/markdown.js';
export { loadPages, loadPosts, parsePostIdentifier, postUrl, readPost } from './lib/posts.js';
export {
  createIncludeRegistry,
  imageInclude,
  type IncludeHandler,
  type IncludeRegistry,
  type IncludeResult,
} from './lib/remark-include.js';
export { createSiteContext, type SiteContext } from './lib/site.js';
export type { Diagnostic, FrontMatter, FrontMatterValue, Page, Post } from './types/post.js';
