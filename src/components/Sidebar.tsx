import { menuRoutes, type RouteItem } from '../lib/routes.js';
import type { SiteContext } from '../lib/site.js';

// #menu is always visible on wide viewports; on narrow ones `.menu-toggle` targets it.
export default function Sidebar({ site, currentUrl }: { site: SiteContext; currentUrl: string }) {
  const { config } = site;
  return (
    <nav id="menu" className="sidebar">
      {config.portrait && <img className="portrait" src={config.portrait} alt={config.author || config.title} />}
      <p className="sidebar-about">{config.description}</p>
      <ul className="sidebar-nav">
        {menuRoutes(config.baseurl, config.menu).map((r: RouteItem) => {
          const active = currentUrl === r.href;
          return (
            <li key={r.href}>
              <a
                href={r.href}
                aria-current={active ? 'page' : undefined}
                className={['sidebar-nav-item', active && 'active'].filter(Boolean).join(' ')}
              >
                {r.label}
              </a>
            </li>
          );
        })}
      </ul>
    </nav>
  );
}
