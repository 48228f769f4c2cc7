import { DuplicateIdentifierError, UnknownPostError } from './errors.js';
import { frontMatterList } from './frontmatter.js';
import type { Post } from '../types/post.js';

export type Neighbors = {
  older: Post | null;
  newer: Post | null;
};

export type PostPage = {
  /** 1-based. */
  index: number;
  posts: Post[];
  previous: number | null;
  next: number | null;
  totalPages: number;
  totalPosts: number;
};

/** Newest first; same-day posts by identifier, compared by code unit. */
export function comparePosts(a: Post, b: Post): number {
  const byDate = b.date.getTime() - a.date.getTime();
  if (byDate !== 0) return byDate;
  if (a.identifier === b.identifier) return 0;
  return a.identifier < b.identifier ? -1 : 1;
}

export function relatedTokens(post: Post): Set<string> {
  const tokens = new Set<string>();
  for (const keyword of frontMatterList(post.frontMatter, 'keywords')) {
    const token = keyword.trim().toLowerCase();
    if (token) tokens.add(token);
  }
  for (const tag of frontMatterList(post.frontMatter, 'tags')) {
    for (const word of tag.toLowerCase().split(/[\s,]+/)) {
      if (word) tokens.add(word);
    }
  }
  return tokens;
}

export function assertUniqueIdentifiers(posts: Iterable<Post>): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const post of posts) {
    if (seen.has(post.identifier)) duplicates.add(post.identifier);
    seen.add(post.identifier);
  }
  if (duplicates.size > 0) throw new DuplicateIdentifierError([...duplicates].sort());
}

/**
 * The site's posts in publication order. Built once per run and never mutated;
 * every listing, neighbor lookup and related-post query reads from it.
 */
export class PostCollection {
  private readonly ordered: readonly Post[];
  private readonly positions: ReadonlyMap<string, number>;

  constructor(posts: Iterable<Post>) {
    const list = [...posts];
    assertUniqueIdentifiers(list);
    this.ordered = Object.freeze(list.sort(comparePosts));
    this.positions = new Map(this.ordered.map((post, i) => [post.identifier, i]));
  }

  get size(): number {
    return this.ordered.length;
  }

  all(): Post[] {
    return [...this.ordered];
  }

  get(identifier: string): Post | undefined {
    const position = this.positions.get(identifier);
    return position === undefined ? undefined : this.ordered[position];
  }

  neighbors(post: Post): Neighbors {
    const position = this.positionOf(post);
    return {
      newer: position > 0 ? this.ordered[position - 1] : null,
      older: position < this.ordered.length - 1 ? this.ordered[position + 1] : null,
    };
  }

  /** Lazy and restartable: every iteration walks the pages again from the first one. */
  paginate(pageSize: number): Iterable<PostPage> {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
    }
    const ordered = this.ordered;
    const totalPages = Math.ceil(ordered.length / pageSize);

    return {
      *[Symbol.iterator](): Iterator<PostPage> {
        for (let index = 1; index <= totalPages; index++) {
          yield {
            index,
            posts: ordered.slice((index - 1) * pageSize, index * pageSize),
            previous: index > 1 ? index - 1 : null,
            next: index < totalPages ? index + 1 : null,
            totalPages,
            totalPosts: ordered.length,
          };
        }
      },
    };
  }

  related(post: Post, maxCount: number): Post[] {
    if (!Number.isInteger(maxCount) || maxCount < 0) {
      throw new RangeError(`Related post count must be a non-negative integer, got ${maxCount}`);
    }
    this.positionOf(post);
    const tokens = relatedTokens(post);
    if (tokens.size === 0 || maxCount === 0) return [];

    const scored: Array<{ post: Post; shared: number }> = [];
    for (const candidate of this.ordered) {
      if (candidate.identifier === post.identifier) continue;
      let shared = 0;
      for (const token of relatedTokens(candidate)) {
        if (tokens.has(token)) shared++;
      }
      if (shared > 0) scored.push({ post: candidate, shared });
    }

    return scored
      .sort((a, b) => b.shared - a.shared || comparePosts(a.post, b.post))
      .slice(0, maxCount)
      .map(entry => entry.post);
  }

  private positionOf(post: Post): number {
    const position = this.positions.get(post.identifier);
    if (position === undefined) throw new UnknownPostError(post.identifier);
    return position;
  }
}
