import type { ReactNode } from 'react';

interface LayoutProps {
  title: string;
  /** Seconds until the browser reloads the page */
  refreshSeconds?: number;
  children: ReactNode;
}

export function Layout({ title, refreshSeconds, children }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        {refreshSeconds ? <meta httpEquiv="refresh" content={String(refreshSeconds)} /> : null}
        <title>{`${title} | Itinerary Planner`}</title>
        <link rel="stylesheet" href="/styles.css" />
      </head>
      <body>
        <header className="site-header">
          <a href="/">Itinerary Planner</a>
        </header>
        <main className="container">{children}</main>
      </body>
    </html>
  );
}
