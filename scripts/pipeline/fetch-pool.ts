import * as fs from "fs";
import * as path from "path";
import type { LedgerRecord } from "@shared/schema";
import {
  asIOError,
  describeError,
  IOError,
  isFatal,
  LedgerUnavailableError,
  TransferError,
} from "./errors";
import type { Transfer, TransferSource } from "./http";
import type { ILedger } from "./ledger";
import type { Logger } from "./log";
import { archiveFormatOf, extractAndReplace, materialize } from "./materializer";
import type { TaskQueue } from "./task-queue";
import type { FileEntry } from "./tree-crawler";

export type OutcomeKind = "skipped-ledger" | "skipped-disk" | "ok" | "failed";

export type TransferOutcome =
  | { entry: FileEntry; localPath: string; outcome: "skipped-ledger" | "skipped-disk" }
  | { entry: FileEntry; localPath: string; outcome: "ok"; byteSize: number; extracted: string[] | null }
  | { entry: FileEntry; localPath: string; outcome: "failed"; error: Error };

export interface PoolOptions {
  workers: number;
  destinationRoot: string;
  /** Task-scoped IOErrors tolerated before the run is aborted; 0 disables. */
  ioErrorLimit: number;
}

export interface PoolDeps {
  ledger: ILedger;
  source: TransferSource;
  logger: Logger;
}

/** Absolute local path for a crawler relative path, confined to the mirror root. */
export function resolveLocalPath(destinationRoot: string, relativePath: string): string {
  const root = path.resolve(destinationRoot);
  const target = path.resolve(root, ...relativePath.split("/"));
  if (!target.startsWith(root + path.sep)) {
    throw new IOError(`Refusing to write outside ${root}: ${relativePath}`, target);
  }
  return target;
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Fixed set of workers draining a TaskQueue. Each task walks
 * ledger check -> disk check -> transfer -> materialize -> ledger record,
 * and every task produces exactly one TransferOutcome. Task-scoped failures
 * become `failed` outcomes; fatal errors stop all workers and reject run().
 */
export class FetchWorkerPool {
  private ioErrors = 0;

  constructor(
    private readonly options: PoolOptions,
    private readonly deps: PoolDeps,
  ) {}

  async run(
    queue: TaskQueue<FileEntry>,
    onOutcome: (outcome: TransferOutcome) => void,
    signal?: AbortSignal,
  ): Promise<void> {
    const stop = new AbortController();
    let fatal: unknown = null;

    const halt = (reason?: unknown) => {
      if (!stop.signal.aborted) stop.abort(reason);
      queue.abandon();
    };
    const onExternalAbort = () => halt(signal?.reason);
    if (signal?.aborted) halt(signal.reason);
    else signal?.addEventListener("abort", onExternalAbort, { once: true });

    const worker = async () => {
      while (!stop.signal.aborted) {
        const entry = await queue.take();
        if (entry === undefined || stop.signal.aborted) return;

        try {
          const outcome = await this.process(entry, stop.signal);
          onOutcome(outcome);
          if (outcome.outcome === "failed") this.trackIOError(outcome.error);
        } catch (err: unknown) {
          fatal ??= err;
          halt(err);
          return;
        }
      }
    };

    try {
      await Promise.all(Array.from({ length: Math.max(1, this.options.workers) }, worker));
    } finally {
      signal?.removeEventListener("abort", onExternalAbort);
    }
    if (fatal !== null) throw fatal;
  }

  private trackIOError(error: Error): void {
    if (!(error instanceof IOError) || this.options.ioErrorLimit <= 0) return;
    this.ioErrors++;
    if (this.ioErrors >= this.options.ioErrorLimit) {
      throw new IOError(
        `Aborting after ${this.ioErrors} disk errors, last: ${error.message}`,
        error.path,
        error.code,
        error,
      );
    }
  }

  /** Resolves with the task's outcome; rejects only with run-level errors. */
  async process(entry: FileEntry, signal?: AbortSignal): Promise<TransferOutcome> {
    const { ledger, logger } = this.deps;

    let localPath: string;
    try {
      localPath = resolveLocalPath(this.options.destinationRoot, entry.relativePath);
    } catch (err: unknown) {
      return this.failed(entry, path.join(this.options.destinationRoot, entry.relativePath), err);
    }

    let existing: LedgerRecord | null;
    try {
      existing = await ledger.lookup(entry.location);
    } catch (err: unknown) {
      throw new LedgerUnavailableError(`Ledger lookup failed for ${entry.location}: ${describeError(err)}`, err);
    }

    if (existing && (await this.recordStillHolds(existing))) {
      logger.info(`[SKIP] ${entry.relativePath} (ledger)`);
      return { entry, localPath, outcome: "skipped-ledger" };
    }

    if (await pathExists(localPath)) {
      if (archiveFormatOf(localPath) !== "none") {
        return this.resumeExtraction(entry, localPath);
      }
      logger.info(`[SKIP] ${entry.relativePath} (on disk)`);
      return { entry, localPath, outcome: "skipped-disk" };
    }

    let transfer: Transfer;
    try {
      transfer = await this.deps.source.openTransfer(entry.location, signal);
    } catch (err: unknown) {
      return this.failed(entry, localPath, err);
    }

    let placed: Awaited<ReturnType<typeof materialize>>;
    try {
      placed = await materialize(transfer.body, localPath);
    } catch (err: unknown) {
      await transfer.cancel();
      return this.failed(entry, localPath, err);
    }

    await this.record(entry, localPath, placed.byteSize);
    logger.info(`[OK]   ${entry.relativePath}${placed.extracted ? ` (extracted ${placed.extracted.length} files)` : ""}`);
    return { entry, localPath, outcome: "ok", byteSize: placed.byteSize, extracted: placed.extracted };
  }

  /** A ledger row counts only while its file is on disk, or was an archive that got unpacked. */
  private async recordStillHolds(record: LedgerRecord): Promise<boolean> {
    if (archiveFormatOf(record.localPath) !== "none") return true;
    return pathExists(record.localPath);
  }

  /** An archive left on disk by an earlier run that could not unpack it. */
  private async resumeExtraction(entry: FileEntry, localPath: string): Promise<TransferOutcome> {
    let byteSize: number;
    let extracted: string[];
    try {
      byteSize = (await fs.promises.stat(localPath)).size;
      extracted = await extractAndReplace(localPath);
    } catch (err: unknown) {
      return this.failed(entry, localPath, err);
    }

    await this.record(entry, localPath, byteSize);
    this.deps.logger.info(`[OK]   ${entry.relativePath} (resumed extraction, ${extracted.length} files)`);
    return { entry, localPath, outcome: "ok", byteSize, extracted };
  }

  private async record(entry: FileEntry, localPath: string, byteSize: number): Promise<void> {
    try {
      await this.deps.ledger.record({
        location: entry.location,
        relativePath: entry.relativePath,
        localPath,
        completedAt: new Date(),
        byteSize,
      });
    } catch (err: unknown) {
      if (isFatal(err)) throw err;
      throw new LedgerUnavailableError(`Ledger write failed for ${entry.location}: ${describeError(err)}`, err);
    }
  }

  private failed(entry: FileEntry, localPath: string, err: unknown): TransferOutcome {
    const error =
      err instanceof TransferError || err instanceof IOError ? err : (asIOError(err, localPath) ?? toError(err));
    this.deps.logger.error(`[FAIL] ${entry.relativePath} - ${error.message}`);
    return { entry, localPath, outcome: "failed", error };
  }
}
