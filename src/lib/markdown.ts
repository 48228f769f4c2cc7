import { unified, type PluggableList } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkRehype from 'remark-rehype';
import rehypeRaw from 'rehype-raw';
import rehypeSlug from 'rehype-slug';
import rehypeStringify from 'rehype-stringify';
import { VFile } from 'vfile';
import remarkInclude, { type IncludeRegistry } from './remark-include.js';
import type { FrontMatter } from '../types/post.js';

export type MarkdownOptions = {
  includes?: IncludeRegistry;
  root?: string;
};

export type RenderOptions = MarkdownOptions & {
  frontMatter?: FrontMatter;
  /** Reported on warnings; nothing is read from it. */
  path?: string;
};

export type RenderResult = {
  html: string;
  warnings: VFile['messages'];
};

// Fenced code keeps its `language-*` class; highlighting is left to the browser side.
export function getMarkdownOptions(opts: MarkdownOptions = {}): { remarkPlugins: PluggableList; rehypePlugins: PluggableList } {
  return {
    remarkPlugins: [remarkGfm, [remarkInclude, { includes: opts.includes, root: opts.root }]],
    rehypePlugins: [rehypeRaw, rehypeSlug],
  };
}

export async function renderMarkdown(body: string, options: RenderOptions = {}): Promise<RenderResult> {
  const { remarkPlugins, rehypePlugins } = getMarkdownOptions(options);
  const file = new VFile({ value: body, path: options.path });
  file.data.frontMatter = options.frontMatter ?? {};

  const result = await unified()
    .use(remarkParse)
    .use(remarkPlugins)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypePlugins)
    .use(rehypeStringify)
    .process(file);

  return { html: String(result), warnings: [...result.messages] };
}
