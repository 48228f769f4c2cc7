import { formatPostDate } from '../lib/dates.js';
import { postTitle } from '../lib/posts.js';
import type { Post } from '../types/post.js';

export default function RelatedPosts({ posts }: { posts: Post[] }) {
  if (posts.length === 0) return null;
  return (
    <aside className="related">
      <h2>Related Posts</h2>
      <ul className="related-posts">
        {posts.map(p => (
          <li key={p.identifier}>
            <h3>
              <a href={p.url}>
                {postTitle(p)} <small>{formatPostDate(p.date)}</small>
              </a>
            </h3>
          </li>
        ))}
      </ul>
    </aside>
  );
}
