import type { ReactNode } from 'react';

const STYLES = `
body { margin: 0; font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Arial, sans-serif; background: #f5f5f5; color: #222; }
header { display: flex; gap: 16px; align-items: center; padding: 12px 24px; background: #0063dc; }
header a { color: #fff; text-decoration: none; font-weight: 600; }
header .account { margin-left: auto; color: #dbe8ff; }
main { max-width: 960px; margin: 0 auto; padding: 24px; }
.photo-grid { list-style: none; padding: 0; display: grid; grid-template-columns: repeat(auto-fill, minmax(200px, 1fr)); gap: 16px; }
.photo-grid li, .friend, .group { background: #fff; border-radius: 6px; padding: 12px; }
.photo-meta { color: #666; font-size: 13px; }
.filters a, .pager a { margin-right: 12px; }
.filters a.active { font-weight: 700; }
.tags span { display: inline-block; margin: 0 6px 6px 0; padding: 2px 8px; background: #e8eef9; border-radius: 10px; }
`;

export interface LayoutProps {
  title: string;
  /** Display name of the signed-in user, when there is one. */
  viewer?: string;
  children: ReactNode;
}

export function Layout({ title, viewer, children }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{`${title} · Photo Relay`}</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body>
        <header>
          <a href="/">Photos</a>
          <a href="/friends">Friends</a>
          <a href="/groups">Groups</a>
          {viewer ? (
            <span className="account">
              Signed in as <strong>{viewer}</strong> · <a href="/logout">Log out</a>
            </span>
          ) : (
            <span className="account">
              <a href="/login">Log in with Flickr</a>
            </span>
          )}
        </header>
        <main>
          <h1>{title}</h1>
          {children}
        </main>
      </body>
    </html>
  );
}
