import { escapeHtml } from "./html-renderer.js";

export interface NavLink {
  label: string;
  href: string;
}

export interface LayoutOptions {
  siteTitle: string;
  pageTitle: string;
  /** Rendered page body, inserted as-is */
  body: string;
  /** Target of the brand link in the navbar */
  homeUrl: string;
  navLinks?: NavLink[];
  stylesheets?: string[];
  scripts?: string[];
}

/**
 * Wrap a rendered page body in the site chrome (Bootstrap navbar and container)
 */
export function renderLayout(options: LayoutOptions): string {
  const siteTitle = escapeHtml(options.siteTitle);
  const pageTitle = escapeHtml(options.pageTitle);

  const stylesheets = (options.stylesheets ?? [])
    .map((href) => `\n  <link href="${escapeHtml(href)}" rel="stylesheet">`)
    .join("");
  const scripts = (options.scripts ?? [])
    .map((src) => `\n  <script src="${escapeHtml(src)}"></script>`)
    .join("");
  const navItems = (options.navLinks ?? [])
    .map(
      (link) => `
          <li class="nav-item">
            <a class="nav-link" href="${escapeHtml(link.href)}">${escapeHtml(link.label)}</a>
          </li>`
    )
    .join("");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${siteTitle} - ${pageTitle}</title>${stylesheets}
</head>
<body>
  <nav class="navbar navbar-expand-lg navbar-dark bg-dark">
    <div class="container">
      <a class="navbar-brand" href="${escapeHtml(options.homeUrl)}">${siteTitle}</a>
      <button class="navbar-toggler" type="button" data-bs-toggle="collapse" data-bs-target="#navbarNav" aria-controls="navbarNav" aria-expanded="false" aria-label="Toggle navigation">
        <span class="navbar-toggler-icon"></span>
      </button>
      <div class="collapse navbar-collapse" id="navbarNav">
        <ul class="navbar-nav ms-auto">${navItems}
        </ul>
      </div>
    </div>
  </nav>
  <div class="container mt-4">
    <h1>${pageTitle}</h1>
    ${options.body}
  </div>${scripts}
</body>
</html>
`;
}

/**
 * Minimal document that forwards the browser to `url`
 */
export function renderRedirect(url: string): string {
  const target = escapeHtml(url);
  return `<!DOCTYPE html>
<html>
<head>
  <title>Redirecting...</title>
  <meta charset="utf-8">
  <meta http-equiv="refresh" content="0; url=${target}">
</head>
<body>
  <p>Redirecting...</p>
  <p><a href="${target}" title="Click here if you are not redirected">Click here</a></p>
</body>
</html>
`;
}
