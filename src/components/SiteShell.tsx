import type { ReactNode } from 'react';
import Sidebar from './Sidebar.js';
import type { SiteContext } from '../lib/site.js';

interface ShellProps {
  site: SiteContext;
  currentUrl: string;
  title?: string;
  description?: string;
  keywords?: string[];
  children: ReactNode;
}

export default function SiteShell({ site, currentUrl, title, description, keywords = [], children }: ShellProps) {
  const { config } = site;
  const fullTitle = title ? `${title} · ${config.title}` : config.title;
  const metaDescription = description || config.description;
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{fullTitle}</title>
        {metaDescription && <meta name="description" content={metaDescription} />}
        {keywords.length > 0 && <meta name="keywords" content={keywords.join(', ')} />}
        <link rel="stylesheet" href={`${config.baseurl}/style.css`} />
      </head>
      <body id="top">
        <Sidebar site={site} currentUrl={currentUrl} />
        <a className="menu-toggle" href="#menu" aria-controls="menu">Menu</a>
        <div className="container">
          <header className="masthead">
            <h3 className="masthead-title">
              <a href={`${config.baseurl}/`} title="Home">{config.title}</a>
              {config.tagline && <small>{config.tagline}</small>}
            </h3>
          </header>
          <main className="content">{children}</main>
        </div>
        <a id="backtotop" href="#top">Back to top</a>
      </body>
    </html>
  );
}
