import SiteShell from './SiteShell.js';
import { frontMatterList } from '../lib/frontmatter.js';
import type { LayoutProps } from '../lib/layouts.js';

export default function PageLayout({ slots, frontMatter, site, page }: LayoutProps) {
  return (
    <SiteShell
      site={site}
      currentUrl={page.url}
      title={slots.title}
      description={slots.description}
      keywords={frontMatterList(frontMatter, 'keywords')}
    >
      <article className="page">
        <h1 className="page-title">{slots.title}</h1>
        <div id="articleContent" dangerouslySetInnerHTML={{ __html: slots.body }} />
      </article>
    </SiteShell>
  );
}
