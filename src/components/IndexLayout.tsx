import Pagination from './Pagination.js';
import SiteShell from './SiteShell.js';
import { formatPostDate, isoDate } from '../lib/dates.js';
import { frontMatterString } from '../lib/frontmatter.js';
import { postTitle } from '../lib/posts.js';
import { indexPageUrl } from '../lib/routes.js';
import type { LayoutProps } from '../lib/layouts.js';

export default function IndexLayout({ slots, site, page }: LayoutProps) {
  const { paginator } = page;
  const { baseurl } = site.config;
  const posts = paginator?.posts ?? [];
  return (
    <SiteShell site={site} currentUrl={page.url} title={slots.title} description={slots.description}>
      {slots.body && <div className="index-intro" dangerouslySetInnerHTML={{ __html: slots.body }} />}
      <div className="posts">
        {posts.map(p => (
          <article key={p.identifier} className="post">
            <h1 className="post-title">
              <a href={p.url}>{postTitle(p)}</a>
            </h1>
            <time className="post-date" dateTime={isoDate(p.date)}>{formatPostDate(p.date)}</time>
            {frontMatterString(p.frontMatter, 'description') && (
              <p className="post-description">{frontMatterString(p.frontMatter, 'description')}</p>
            )}
          </article>
        ))}
      </div>
      {paginator && paginator.totalPages > 1 && (
        <Pagination
          older={paginator.next === null ? null : indexPageUrl(baseurl, paginator.next)}
          newer={paginator.previous === null ? null : indexPageUrl(baseurl, paginator.previous)}
        />
      )}
    </SiteShell>
  );
}
