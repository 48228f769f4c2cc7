import fs from 'node:fs';
import path from 'node:path';
import type { Plugin } from 'unified';
import type { Paragraph, Root } from 'mdast';
import type { Element, ElementContent, Properties } from 'hast';
import { SKIP, visit } from 'unist-util-visit';
import { imageSize } from 'image-size';
import type { FrontMatter } from '../types/post.js';

// Remark plugin: expand Liquid-style `{% include name key="value" %}` paragraphs into HTML.
// A directive must stand as its own paragraph. Anything it cannot expand stays as literal
// text and is reported as a file message instead of failing the render.

export type IncludeAttributes = Record<string, string>;

export type IncludeContext = {
  root?: string;
  frontMatter: FrontMatter;
  warn: (reason: string) => void;
};

export type IncludeResult =
  | { ok: true; element: Element }
  | { ok: false; reason: string };

export type IncludeHandler = (attributes: IncludeAttributes, context: IncludeContext) => IncludeResult;

export type IncludeRegistry = ReadonlyMap<string, IncludeHandler>;

export type RemarkIncludeOptions = {
  includes?: IncludeRegistry;
  /** Site root used to resolve local image paths. */
  root?: string;
};

declare module 'vfile' {
  interface DataMap {
    frontMatter: FrontMatter;
  }
}

const DIRECTIVE = /\{%-?\s*include\s+([^\s%]+)(.*?)-?%\}/gs;
const ATTRIBUTE = /^([A-Za-z][\w-]*)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"']+))\s*/;
const REMOTE = /^(?:[a-z][a-z\d+.-]*:|\/\/)/i;

export function parseIncludeAttributes(source: string): IncludeAttributes | undefined {
  const attributes: IncludeAttributes = {};
  let rest = source.trim();
  while (rest.length > 0) {
    const match = ATTRIBUTE.exec(rest);
    if (!match) return undefined;
    attributes[match[1]] = match[2] ?? match[3] ?? match[4];
    rest = rest.slice(match[0].length);
  }
  return attributes;
}

function element(tagName: string, properties: Properties, children: ElementContent[] = []): Element {
  return { type: 'element', tagName, properties, children };
}

function text(value: string): ElementContent {
  return { type: 'text', value };
}

function credit(label: string, href: string | undefined): ElementContent {
  return href ? element('a', { href }, [text(label)]) : text(label);
}

function attributionLine(attributes: IncludeAttributes): Element | undefined {
  const { by, licence } = attributes;
  if (!by && !licence) return undefined;
  const children: ElementContent[] = [];
  if (by) children.push(text('Image by '), credit(by, attributes['by-url']));
  if (licence) {
    children.push(text(by ? ', licensed under ' : 'Licensed under '), credit(licence, attributes['licence-url']));
  }
  return element('p', { className: ['image-attribution'] }, children);
}

function localDimensions(url: string, context: IncludeContext): Properties {
  if (!context.root || REMOTE.test(url)) return {};
  const imgPath = path.join(context.root, url.replace(/^\//, ''));
  if (!fs.existsSync(imgPath)) return {};
  try {
    const { width, height } = imageSize(imgPath);
    return width && height ? { width, height } : {};
  } catch (error) {
    context.warn(`Could not read image size of ${url}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
}

/** `image.html`: a captioned figure with an optional attribution line. */
export const imageInclude: IncludeHandler = (attributes, context) => {
  const { url, description } = attributes;
  if (!url) return { ok: false, reason: 'image.html requires a "url" attribute' };
  if (!description) return { ok: false, reason: 'image.html requires a "description" attribute' };

  const children: ElementContent[] = [
    element('img', { src: url, alt: description, ...localDimensions(url, context) }),
    element('figcaption', {}, [text(description)]),
  ];
  const attribution = attributionLine(attributes);
  if (attribution) children.push(attribution);
  return { ok: true, element: element('figure', { className: ['image'] }, children) };
};

export function createIncludeRegistry(extra: Record<string, IncludeHandler> = {}): IncludeRegistry {
  return new Map<string, IncludeHandler>([['image.html', imageInclude], ...Object.entries(extra)]);
}

// remark-rehype turns a node carrying hName/hProperties/hChildren into that element.
function toFlowNode(expanded: Element): Paragraph {
  return {
    type: 'paragraph',
    children: [],
    data: { hName: expanded.tagName, hProperties: expanded.properties, hChildren: expanded.children },
  };
}

// Overwrites inline code spans with backticks: directives quoted in code are neither expanded
// nor reported, and the span still counts as prose around a directive.
function maskInlineCode(raw: string, paragraph: Paragraph, offset: number): string {
  let masked = raw;
  visit(paragraph, 'inlineCode', code => {
    const from = code.position?.start.offset;
    const to = code.position?.end.offset;
    if (from === undefined || to === undefined) return;
    masked = masked.slice(0, from - offset) + '`'.repeat(to - from) + masked.slice(to - offset);
  });
  return masked;
}

const remarkInclude: Plugin<[RemarkIncludeOptions?], Root> = (options = {}) => {
  const includes = options.includes ?? createIncludeRegistry();

  return (tree, file) => {
    const source = String(file.value);
    const frontMatter = file.data.frontMatter ?? {};

    visit(tree, 'paragraph', (node, index, parent) => {
      const start = node.position?.start.offset;
      const end = node.position?.end.offset;
      if (start === undefined || end === undefined || parent === undefined || index === undefined) return;

      // Raw source, since autolinks and emphasis split the directive across inline nodes.
      const raw = maskInlineCode(source.slice(start, end), node, start);
      const directives = [...raw.matchAll(DIRECTIVE)];
      if (directives.length === 0) return;

      const report = (reason: string) => {
        file.message(reason, { place: node.position, ruleId: 'include', source: 'remark-include' });
      };

      if (raw.replace(DIRECTIVE, '').trim() !== '') {
        report('Include directives must stand in their own paragraph; left as text');
        return;
      }

      const expanded: Paragraph[] = [];
      for (const [directive, name, attributeSource] of directives) {
        const handler = includes.get(name);
        if (!handler) {
          report(`Unknown include "${name}"; left as text`);
          return;
        }
        const attributes = parseIncludeAttributes(attributeSource);
        if (!attributes) {
          report(`Cannot parse attributes of ${directive.trim()}; left as text`);
          return;
        }
        const result = handler(attributes, { root: options.root, frontMatter, warn: report });
        if (!result.ok) {
          report(`${result.reason}; left as text`);
          return;
        }
        expanded.push(toFlowNode(result.element));
      }

      parent.children.splice(index, 1, ...expanded);
      return [SKIP, index + expanded.length];
    });
  };
};

export default remarkInclude;
