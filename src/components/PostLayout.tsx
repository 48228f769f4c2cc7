import Pagination from './Pagination.js';
import RelatedPosts from './RelatedPosts.js';
import SiteShell from './SiteShell.js';
import { isoDate } from '../lib/dates.js';
import { frontMatterList } from '../lib/frontmatter.js';
import type { LayoutProps } from '../lib/layouts.js';

export default function PostLayout({ slots, frontMatter, site, page }: LayoutProps) {
  const { post, neighbors, related = [] } = page;
  return (
    <SiteShell
      site={site}
      currentUrl={page.url}
      title={slots.title}
      description={slots.description}
      keywords={frontMatterList(frontMatter, 'keywords')}
    >
      <article className="post">
        <h1 className="post-title">{slots.title}</h1>
        <time className="post-date" dateTime={post ? isoDate(post.date) : undefined}>{slots.date}</time>
        <p className="post-description">{slots.description}</p>
        <div id="articleContent" dangerouslySetInnerHTML={{ __html: slots.body }} />
      </article>
      <RelatedPosts posts={related} />
      {neighbors && <Pagination older={neighbors.older?.url ?? null} newer={neighbors.newer?.url ?? null} />}
    </SiteShell>
  );
}
