import SiteShell from './SiteShell.js';
import type { LayoutProps } from '../lib/layouts.js';

export default function DefaultLayout({ slots, site, page }: LayoutProps) {
  return (
    <SiteShell site={site} currentUrl={page.url} title={slots.title} description={slots.description}>
      <div dangerouslySetInnerHTML={{ __html: slots.body }} />
    </SiteShell>
  );
}
