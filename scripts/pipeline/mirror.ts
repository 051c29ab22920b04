import * as path from "path";
import type { MirrorConfig } from "./config";
import { CrawlError, describeError, LedgerUnavailableError } from "./errors";
import { FetchWorkerPool, type OutcomeKind, type TransferOutcome } from "./fetch-pool";
import type { ListingSource, TransferSource } from "./http";
import { DatabaseLedger, type ILedger } from "./ledger";
import { formatBytes, type Logger } from "./log";
import { regionFilter } from "./region-filter";
import { TaskQueue } from "./task-queue";
import { TreeCrawler, type FileEntry } from "./tree-crawler";

const PROGRESS_EVERY = 50;

export interface MirrorDeps {
  client: ListingSource & TransferSource;
  logger: Logger;
  openLedger?: (dbFile: string) => ILedger;
}

export interface MirrorSummary {
  queued: number;
  counts: Record<OutcomeKind, number>;
  /** Queued tasks never picked up because the run stopped early. */
  notAttempted: number;
  totalBytes: number;
  elapsedMs: number;
  crawlErrors: CrawlError[];
  failures: Array<{ relativePath: string; reason: string }>;
  fatalError: Error | null;
  interrupted: boolean;
  exitCode: number;
}

export interface CountResult {
  total: number;
  crawlErrors: CrawlError[];
  exitCode: number;
}

function emptyCounts(): Record<OutcomeKind, number> {
  return { "skipped-ledger": 0, "skipped-disk": 0, ok: 0, failed: 0 };
}

/**
 * Wires crawler, task queue, worker pool and ledger together for one run.
 * Configuration is fixed at construction; each run() uses a fresh crawler.
 */
export class MirrorOrchestrator {
  constructor(
    private readonly config: MirrorConfig,
    private readonly deps: MirrorDeps,
  ) {}

  private crawler(): TreeCrawler {
    return new TreeCrawler(this.deps.client, this.deps.logger, {
      concurrency: this.config.crawlConcurrency,
    });
  }

  /** Crawl only and report how many leaf files would be queued. */
  async count(signal?: AbortSignal): Promise<CountResult> {
    const { logger } = this.deps;
    const crawler = this.crawler();
    const keep = regionFilter(this.config.regions);
    let total = 0;
    let unfiltered = 0;

    logger.info(`Fetching file list from ${this.config.baseUrl} ...`);
    for await (const entry of crawler.discover(this.config.baseUrl, signal)) {
      unfiltered++;
      if (keep(entry.relativePath)) total++;
    }

    logger.info(`Found ${unfiltered} files.`);
    if (this.config.regions.length > 0) {
      logger.info(`Region filter [${this.config.regions.join(", ")}]: ${total}/${unfiltered} files matched.`);
    }

    const crawlFailed = crawler.errors.length > this.config.crawlErrorTolerance;
    return { total, crawlErrors: crawler.errors, exitCode: signal?.aborted ? 130 : crawlFailed ? 1 : 0 };
  }

  async run(signal?: AbortSignal): Promise<MirrorSummary> {
    const { logger } = this.deps;
    const startTime = Date.now();
    const openLedger = this.deps.openLedger ?? ((file: string) => DatabaseLedger.open(file));

    let ledger: ILedger;
    try {
      ledger = openLedger(this.config.dbFile);
    } catch (err: unknown) {
      throw new LedgerUnavailableError(`Cannot open ledger ${this.config.dbFile}: ${describeError(err)}`, err);
    }

    const stop = new AbortController();
    const onAbort = () => stop.abort(signal?.reason);
    if (signal?.aborted) stop.abort(signal.reason);
    else signal?.addEventListener("abort", onAbort, { once: true });

    const queue = new TaskQueue<FileEntry>();
    const crawler = this.crawler();
    const pool = new FetchWorkerPool(
      {
        workers: this.config.maxThreads,
        destinationRoot: path.resolve(this.config.downloadDir),
        ioErrorLimit: this.config.ioErrorLimit,
      },
      { ledger, source: this.deps.client, logger },
    );

    const counts = emptyCounts();
    const failures: MirrorSummary["failures"] = [];
    let totalBytes = 0;
    let finished = 0;
    let queued = 0;

    const onOutcome = (outcome: TransferOutcome) => {
      counts[outcome.outcome]++;
      finished++;
      if (outcome.outcome === "ok") totalBytes += outcome.byteSize;
      if (outcome.outcome === "failed") {
        failures.push({ relativePath: outcome.entry.relativePath, reason: outcome.error.message });
      }
      if (finished % PROGRESS_EVERY === 0) {
        logger.info(`Progress: ${finished}/${queued} files processed.`);
      }
    };

    const keep = regionFilter(this.config.regions);
    logger.info(`Fetching file list from ${this.config.baseUrl} ...`);
    logger.info(`Starting download with ${this.config.maxThreads} workers...`);

    const crawling = (async () => {
      try {
        for await (const entry of crawler.discover(this.config.baseUrl, stop.signal)) {
          if (!keep(entry.relativePath)) continue;
          if (!queue.push(entry)) break;
          queued++;
        }
      } finally {
        queue.close();
      }
    })();

    const fetching = pool.run(queue, onOutcome, stop.signal).catch((err: unknown) => {
      // Stop crawling too once the pool has given up
      stop.abort(err);
      throw err;
    });

    const [crawlResult, poolResult] = await Promise.allSettled([crawling, fetching]);
    signal?.removeEventListener("abort", onAbort);
    ledger.close();

    let fatalError: Error | null = null;
    for (const result of [poolResult, crawlResult]) {
      if (result.status === "rejected" && fatalError === null) {
        fatalError = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
      }
    }

    const interrupted = signal?.aborted ?? false;
    const crawlFailed = crawler.errors.length > this.config.crawlErrorTolerance;
    const exitCode = interrupted ? 130 : fatalError || counts.failed > 0 || crawlFailed ? 1 : 0;

    const summary: MirrorSummary = {
      queued,
      counts,
      notAttempted: queued - finished,
      totalBytes,
      elapsedMs: Date.now() - startTime,
      crawlErrors: crawler.errors,
      failures,
      fatalError,
      interrupted,
      exitCode,
    };
    this.printSummary(summary);
    return summary;
  }

  private printSummary(summary: MirrorSummary): void {
    const { logger } = this.deps;
    const { counts } = summary;
    const finished = summary.queued - summary.notAttempted;

    logger.info(`Progress: ${finished}/${summary.queued} files processed.`);
    logger.info("=== Mirror Summary ===");
    logger.info(`Transferred:       ${counts.ok}`);
    logger.info(`Skipped (ledger):  ${counts["skipped-ledger"]}`);
    logger.info(`Skipped (on disk): ${counts["skipped-disk"]}`);
    logger.info(`Failed:            ${counts.failed}`);
    if (summary.notAttempted > 0) logger.info(`Not attempted:     ${summary.notAttempted}`);
    logger.info(`Total size:        ${formatBytes(summary.totalBytes)}`);
    logger.info(`Time elapsed:      ${(summary.elapsedMs / 1000).toFixed(1)}s`);
    logger.info(`Crawl errors:      ${summary.crawlErrors.length}`);

    for (const failure of summary.failures) {
      logger.warn(`  ${failure.relativePath} - ${failure.reason}`);
    }
    for (const error of summary.crawlErrors) {
      logger.warn(`  ${error.message}`);
    }
    if (summary.fatalError) {
      logger.error(`Run aborted: ${summary.fatalError.message}`);
    } else if (summary.interrupted) {
      logger.warn("Run interrupted.");
    } else if (summary.exitCode === 0) {
      logger.info("All downloads completed.");
    }
  }
}
