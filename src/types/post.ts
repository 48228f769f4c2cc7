export type FrontMatterValue = string | string[];

export type FrontMatter = Record<string, FrontMatterValue>;

export type Post = {
  identifier: string; // YYYY-MM-DD-slug
  slug: string;
  date: Date; // UTC midnight of the identifier's date
  frontMatter: FrontMatter;
  body: string; // markdown
  url: string;
  sourcePath: string;
  bodyOffset: number; // file lines before the body
};

// Top-level content such as about.md; pages never join the post collection.
export type Page = {
  name: string;
  frontMatter: FrontMatter;
  body: string;
  url: string;
  sourcePath: string;
  bodyOffset: number; // file lines before the body
};

export type Severity = 'error' | 'warning';

export type Diagnostic = {
  file: string;
  severity: Severity;
  message: string;
  line?: number;
  column?: number;
};
