import matter from 'gray-matter';
import { z } from 'zod';
import { MalformedFrontMatterError } from './errors.js';
import type { FrontMatter, FrontMatterValue } from '../types/post.js';

const DELIMITER = '---';
const ENGINE = 'folio';
const KEY_LINE = /^([A-Za-z0-9_][\w-]*)\s*:(.*)$/;
const QUOTED = /^(["'])(.*)\1$/;

export const frontMatterSchema = z.record(z.union([z.string(), z.array(z.string())]));

export type ParsedContent = {
  frontMatter: FrontMatter;
  body: string;
  /** Number of file lines that precede the body. */
  bodyOffset: number;
};

function isDelimiter(line: string): boolean {
  return line === DELIMITER || line === `${DELIMITER}\r`;
}

function parseValue(raw: string): FrontMatterValue {
  const value = raw.trim();
  const quoted = QUOTED.exec(value);
  if (quoted) return quoted[2];
  if (!value.includes(',')) return value;
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

// gray-matter hands over everything after the opening `---`, so block line i is file line i + 1.
function parseBlock(block: string): FrontMatter {
  const data: FrontMatter = {};
  block.split(/\r?\n/).forEach((line, i) => {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) return;
    const match = KEY_LINE.exec(trimmed);
    if (!match) {
      throw new MalformedFrontMatterError(`Expected "key: value" on line ${i + 1}, got "${trimmed}"`, i + 1);
    }
    data[match[1]] = parseValue(match[2]);
  });
  return data;
}

function serializeValue(value: FrontMatterValue): string {
  if (Array.isArray(value)) {
    // A trailing comma keeps zero- and one-item lists lists when read back.
    return value.length < 2 ? `${value.join('')},` : value.join(', ');
  }
  const needsQuotes = value.includes(',') || QUOTED.test(value) || value !== value.trim();
  return needsQuotes ? `"${value}"` : value;
}

function serializeBlock(data: object): string {
  const frontMatter = frontMatterSchema.parse(data);
  return Object.entries(frontMatter)
    .map(([key, value]) => `${key}: ${serializeValue(value)}`)
    .join('\n');
}

const engines = {
  [ENGINE]: { parse: parseBlock, stringify: serializeBlock },
};

/**
 * Splits a content file into its front matter and Markdown body.
 *
 * The front matter is the block between a first line of `---` and the next line that is
 * exactly `---`. Files that do not open with the delimiter are all body.
 */
export function parseFrontMatter(text: string): ParsedContent {
  const source = text.replace(/^\uFEFF/, '');
  const lines = source.split('\n');
  if (!isDelimiter(lines[0])) return { frontMatter: {}, body: source, bodyOffset: 0 };

  let closing = -1;
  for (let i = 1; i < lines.length; i++) {
    if (isDelimiter(lines[i])) {
      closing = i;
      break;
    }
    if (lines[i].startsWith(DELIMITER)) {
      throw new MalformedFrontMatterError(`Unexpected delimiter-like line ${i + 1}: "${lines[i].trim()}"`, i + 1);
    }
  }
  if (closing === -1) {
    throw new MalformedFrontMatterError('Front matter opened on line 1 is never closed', 1);
  }

  const file = matter(source, { language: ENGINE, engines });
  return { frontMatter: frontMatterSchema.parse(file.data), body: file.content, bodyOffset: closing + 1 };
}

/** Serializes front matter back to `key: value` lines, followed by the body. */
export function stringifyFrontMatter(frontMatter: FrontMatter, body = ''): string {
  return matter.stringify(body, frontMatter, { language: ENGINE, engines });
}

export function frontMatterString(frontMatter: FrontMatter, key: string): string | undefined {
  const value = frontMatter[key];
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join(', ') : value;
}

export function frontMatterList(frontMatter: FrontMatter, key: string): string[] {
  const value = frontMatter[key];
  if (value === undefined) return [];
  if (Array.isArray(value)) return value;
  return value === '' ? [] : [value];
}

/** True when the text opens with a front-matter delimiter line. */
export function hasFrontMatter(text: string): boolean {
  return isDelimiter(text.replace(/^\uFEFF/, '').split('\n')[0]);
}
