import pLimit from "p-limit";
import { CrawlError, describeError } from "./errors";
import type { ListingSource } from "./http";
import { isNavigationLink, parseListing, type ListingLink } from "./listing-parser";
import type { Logger } from "./log";

export interface FileEntry {
  /** Absolute source URL, unique within a crawl. */
  location: string;
  /** Decoded, "/"-separated path under the mirror root. */
  relativePath: string;
  isDirectory: boolean;
}

export interface CrawlerOptions {
  /** Listing pages fetched in parallel within one frontier level. */
  concurrency: number;
}

export function normalizeRoot(rootLocation: string): string {
  const url = new URL(rootLocation);
  url.hash = "";
  url.search = "";
  if (!url.pathname.endsWith("/")) url.pathname += "/";
  return url.href;
}

/**
 * Path of `location` below `root`, percent-decoded one segment at a time.
 * Returns null for anything that is not strictly inside the root or that
 * decodes to an unsafe segment, including an encoded "/".
 */
export function toRelativePath(root: string, location: string): string | null {
  if (!location.startsWith(root) || location.length === root.length) return null;

  const segments: string[] = [];
  for (const raw of location.slice(root.length).replace(/^\/+|\/+$/g, "").split("/")) {
    let segment: string;
    try {
      segment = decodeURIComponent(raw);
    } catch {
      return null;
    }
    if (segment === "" || segment === "." || segment === ".." || /[\\/\0]/.test(segment)) return null;
    segments.push(segment);
  }
  return segments.join("/");
}

/**
 * Resolves a root listing into its leaf files. Traversal is breadth-first over
 * an explicit frontier; each directory location is listed at most once.
 *
 * `discover` is single-pass: listing failures are collected on `errors` and
 * the affected subtree is skipped, siblings keep going.
 */
export class TreeCrawler {
  readonly errors: CrawlError[] = [];
  private readonly visited = new Set<string>();
  private started = false;

  constructor(
    private readonly source: ListingSource,
    private readonly logger: Logger,
    private readonly options: CrawlerOptions = { concurrency: 4 },
  ) {}

  get visitedDirectories(): number {
    return this.visited.size;
  }

  async *discover(rootLocation: string, signal?: AbortSignal): AsyncGenerator<FileEntry> {
    if (this.started) throw new Error("TreeCrawler.discover can only run once; create a new crawler");
    this.started = true;

    const root = normalizeRoot(rootLocation);
    const limit = pLimit(this.options.concurrency);
    const emitted = new Set<string>();
    const claimedPaths = new Set<string>();
    let frontier = [root];
    this.visited.add(root);

    while (frontier.length > 0) {
      if (signal?.aborted) return;

      const level = frontier;
      frontier = [];
      const listings = await Promise.all(
        level.map(async (directory) => ({
          directory,
          links: await limit(() => this.list(directory, signal)),
        })),
      );

      for (const { directory, links } of listings) {
        if (!links) continue;

        for (const link of links) {
          if (isNavigationLink(link.href)) continue;

          let location: string;
          try {
            const url = new URL(link.href, directory);
            url.hash = "";
            location = url.href;
          } catch {
            continue;
          }
          // Only recurse within the root
          if (!location.startsWith(root)) continue;

          if (link.isDirectory) {
            if (!this.visited.has(location)) {
              this.visited.add(location);
              frontier.push(location);
            }
            continue;
          }

          if (emitted.has(location)) continue;
          emitted.add(location);

          const relativePath = toRelativePath(root, location);
          if (relativePath === null) {
            this.fail(new CrawlError(`Unsafe file path under ${directory}: ${link.href}`, location));
            continue;
          }
          if (claimedPaths.has(relativePath)) {
            this.fail(new CrawlError(`Local path ${relativePath} already taken; skipping ${location}`, location));
            continue;
          }
          claimedPaths.add(relativePath);
          yield { location, relativePath, isDirectory: false };
        }
      }
    }
  }

  private async list(directory: string, signal?: AbortSignal): Promise<ListingLink[] | null> {
    if (signal?.aborted) return null;
    this.logger.info(`Scanning directory: ${directory}`);
    try {
      const html = await this.source.fetchListing(directory, signal);
      return parseListing(html);
    } catch (err: unknown) {
      if (signal?.aborted) return null;
      this.fail(new CrawlError(`Failed to list ${directory}: ${describeError(err)}`, directory, err));
      return null;
    }
  }

  private fail(error: CrawlError): void {
    this.errors.push(error);
    this.logger.error(error.message);
  }
}
