import { describe, expect, it } from 'vitest';
import { PostCollection, relatedTokens } from './collection.js';
import { DuplicateIdentifierError, UnknownPostError } from './errors.js';
import { parsePostIdentifier, postUrl } from './posts.js';
import type { FrontMatter, Post } from '../types/post.js';

function post(identifier: string, frontMatter: FrontMatter = {}): Post {
  const id = parsePostIdentifier(identifier);
  return { ...id, frontMatter, body: '', bodyOffset: 0, url: postUrl('', id), sourcePath: `_posts/${identifier}.md` };
}

const ids = (posts: Post[]) => posts.map(p => p.identifier);

describe('PostCollection', () => {
  const jan = post('2016-01-01-new-year');
  const mar = post('2016-03-21-spring');
  const nov = post('2016-11-11-autumn');

  it('lists posts newest first', () => {
    const collection = new PostCollection([mar, jan, nov]);
    expect(ids(collection.all())).toEqual(['2016-11-11-autumn', '2016-03-21-spring', '2016-01-01-new-year']);
    expect(collection.size).toBe(3);
  });

  it('orders same-day posts by identifier', () => {
    const first = new PostCollection([post('2016-01-01-b'), post('2016-01-02-c'), post('2016-01-01-a')]);
    const second = new PostCollection([post('2016-01-01-a'), post('2016-01-01-b'), post('2016-01-02-c')]);
    expect(ids(first.all())).toEqual(['2016-01-02-c', '2016-01-01-a', '2016-01-01-b']);
    expect(ids(second.all())).toEqual(ids(first.all()));
  });

  it('returns a copy from all()', () => {
    const collection = new PostCollection([jan, mar]);
    collection.all().pop();
    expect(collection.size).toBe(2);
    expect(collection.all()).toHaveLength(2);
  });

  it('rejects duplicate identifiers', () => {
    expect(() => new PostCollection([jan, mar, post('2016-01-01-new-year')])).toThrow(DuplicateIdentifierError);
    expect(() => new PostCollection([jan, post('2016-01-01-new-year')])).toThrow('Duplicate post identifiers: 2016-01-01-new-year');
  });

  it('looks posts up by identifier', () => {
    const collection = new PostCollection([jan, mar]);
    expect(collection.get('2016-03-21-spring')).toBe(mar);
    expect(collection.get('2016-03-22-nope')).toBeUndefined();
  });

  describe('neighbors', () => {
    const collection = new PostCollection([jan, mar, nov]);

    it('links older and newer posts', () => {
      expect(collection.neighbors(mar)).toEqual({ older: jan, newer: nov });
    });

    it('has no newer post at the start and no older post at the end', () => {
      expect(collection.neighbors(nov).newer).toBeNull();
      expect(collection.neighbors(nov).older).toBe(mar);
      expect(collection.neighbors(jan).older).toBeNull();
      expect(collection.neighbors(jan).newer).toBe(mar);
    });

    it('fails for posts outside the collection', () => {
      expect(() => collection.neighbors(post('2017-01-01-elsewhere'))).toThrow(UnknownPostError);
    });
  });

  describe('paginate', () => {
    const posts = ['01', '02', '03', '04', '05', '06', '07'].map(d => post(`2016-01-${d}-day`));
    const collection = new PostCollection(posts);

    it('splits into fixed-size pages with a short last page', () => {
      const pages = [...collection.paginate(3)];
      expect(pages).toHaveLength(3);
      expect(pages.map(p => p.posts.length)).toEqual([3, 3, 1]);
      expect(pages.map(p => [p.index, p.previous, p.next])).toEqual([
        [1, null, 2],
        [2, 1, 3],
        [3, 2, null],
      ]);
      expect(pages[0]).toMatchObject({ totalPages: 3, totalPosts: 7 });
    });

    it('reproduces all() when pages are concatenated', () => {
      for (const size of [1, 2, 3, 7, 10]) {
        const pages = [...collection.paginate(size)];
        expect(pages).toHaveLength(Math.ceil(7 / size));
        expect(ids(pages.flatMap(p => p.posts))).toEqual(ids(collection.all()));
      }
    });

    it('can be iterated more than once', () => {
      const pages = collection.paginate(4);
      expect([...pages].map(p => p.index)).toEqual([1, 2]);
      expect([...pages].map(p => p.index)).toEqual([1, 2]);
    });

    it('yields no pages for an empty collection', () => {
      expect([...new PostCollection([]).paginate(5)]).toEqual([]);
    });

    it('rejects page sizes that are not positive integers', () => {
      expect(() => collection.paginate(0)).toThrow(RangeError);
      expect(() => collection.paginate(2.5)).toThrow('Page size must be a positive integer, got 2.5');
    });
  });

  describe('related', () => {
    const base = post('2016-01-01-base', { keywords: ['Rust', 'wasm'], tags: 'systems' });
    const one = post('2016-02-01-one', { keywords: 'rust' });
    const two = post('2016-01-15-two', { keywords: ['rust', 'wasm'] });
    const tag = post('2016-03-01-tag', { tags: 'Systems web' });
    const none = post('2016-04-01-none', { keywords: ['cooking'] });
    const collection = new PostCollection([base, one, two, tag, none]);

    it('ranks by shared tokens, then recency', () => {
      expect(ids(collection.related(base, 10))).toEqual(['2016-01-15-two', '2016-03-01-tag', '2016-02-01-one']);
    });

    it('caps the result', () => {
      expect(ids(collection.related(base, 2))).toEqual(['2016-01-15-two', '2016-03-01-tag']);
      expect(collection.related(base, 0)).toEqual([]);
    });

    it('returns nothing when no tokens are shared', () => {
      expect(collection.related(none, 5)).toEqual([]);
    });

    it('breaks full ties by identifier', () => {
      const a = post('2016-05-05-a', { tags: 'x' });
      const b = post('2016-05-05-b', { tags: 'x' });
      const c = post('2016-05-05-c', { tags: 'x' });
      expect(ids(new PostCollection([c, b, a]).related(c, 5))).toEqual(['2016-05-05-a', '2016-05-05-b']);
    });
  });
});

describe('relatedTokens', () => {
  it('lowercases keywords whole and splits tags into words', () => {
    const p = post('2016-01-01-x', { keywords: ['Static Sites', 'TypeScript'], tags: 'web, Build tools' });
    expect([...relatedTokens(p)]).toEqual(['static sites', 'typescript', 'web', 'build', 'tools']);
  });
});
