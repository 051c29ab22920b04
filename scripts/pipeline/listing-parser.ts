import * as cheerio from "cheerio";

export interface ListingLink {
  href: string;
  isDirectory: boolean;
}

const NAVIGATION_HREFS = new Set(["../", "./", "/", "index.html", "index.htm"]);

/** Parent-directory, self, index and column-sort links found on autoindex pages. */
export function isNavigationLink(href: string): boolean {
  if (NAVIGATION_HREFS.has(href)) return true;
  if (href.includes("?") || href.startsWith("#")) return true;
  return href.toLowerCase().startsWith("mailto:");
}

/** Extract every anchor of a directory-listing page, in document order. */
export function parseListing(html: string): ListingLink[] {
  const $ = cheerio.load(html);
  const links: ListingLink[] = [];

  $("a[href]").each((_, el) => {
    const href = $(el).attr("href")?.trim();
    if (!href) return;
    links.push({ href, isDirectory: href.endsWith("/") });
  });

  return links;
}
