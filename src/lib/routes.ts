import type { MenuItem } from './config.js';

export type RouteItem = { label: string; href: string };

export function menuRoutes(baseurl: string, menu: MenuItem[]): RouteItem[] {
  return [
    { label: 'Home', href: `${baseurl}/` },
    ...menu.map(item => ({ label: item.title, href: item.url.startsWith('/') ? `${baseurl}${item.url}` : item.url })),
  ];
}

/** Index page 1 lives at the site root, page n under /page<n>/. */
export function indexPageUrl(baseurl: string, index: number): string {
  return index <= 1 ? `${baseurl}/` : `${baseurl}/page${index}/`;
}

/** Maps a site URL such as `/blog/2016/03/21/hello/` to `2016/03/21/hello/index.html`. */
export function outputPath(baseurl: string, url: string): string {
  const relative = url.startsWith(baseurl) ? url.slice(baseurl.length) : url;
  const trimmed = relative.replace(/^\/+/, '');
  if (trimmed === '' || trimmed.endsWith('/')) return `${trimmed}index.html`;
  return trimmed;
}
