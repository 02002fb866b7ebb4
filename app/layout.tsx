import type { ReactNode } from 'react';
import { FlashMessages } from '../components/FlashMessages';
import type { FlashMessage } from '../lib/messages';
import { isAuthenticated, type Viewer } from '../services/auth';
import type { UrlHelper } from '../services/routing';

export interface SiteOptions {
  name: string;
  stylesheet: string;
}

export interface RootLayoutProps {
  title: string;
  site: SiteOptions;
  viewer: Viewer;
  urls: UrlHelper;
  messages?: readonly FlashMessage[];
  children: ReactNode;
}

export function pageTitle(title: string, siteName: string): string {
  return title ? `${title} – ${siteName}` : siteName;
}

function NavLink({ href, label }: { href: string; label: string }) {
  return (
    <li className="nav-item">
      <a href={href} className="nav-link">
        {label}
      </a>
    </li>
  );
}

export default function RootLayout({ title, site, viewer, urls, messages, children }: RootLayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{pageTitle(title, site.name)}</title>
        <link rel="stylesheet" href={urls.asset(site.stylesheet)} />
      </head>
      <body>
        <header className="site-header">
          <nav className="navbar">
            <a href={urls.home()} className="navbar-brand">
              {site.name}
            </a>
            <ul className="navbar-nav">
              <NavLink href={urls.home()} label="Home" />
              {isAuthenticated(viewer) ? (
                <NavLink href={urls.logout()} label="Sign out" />
              ) : (
                <NavLink href={urls.login()} label="Sign in" />
              )}
            </ul>
          </nav>
        </header>

        <main className="container">
          <FlashMessages messages={messages} />
          {children}
        </main>

        <footer className="site-footer">
          <div className="container">{site.name}</div>
        </footer>
      </body>
    </html>
  );
}
