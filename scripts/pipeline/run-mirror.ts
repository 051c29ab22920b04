#!/usr/bin/env -S npx tsx
import "dotenv/config";
import * as path from "path";
import { fileURLToPath } from "url";
import { loadConfig, parseArgs, resolveConfig, type MirrorConfig, type ParsedArgs } from "./config";
import { ConfigError, describeError } from "./errors";
import { HttpClient } from "./http";
import { createLogger, type Logger } from "./log";
import { MirrorOrchestrator } from "./mirror";

const __filename = fileURLToPath(import.meta.url);

function printUsage() {
  console.log(`
USAGE:
  npx tsx scripts/pipeline/run-mirror.ts [run|count] [options]

ACTIONS:
  run              Crawl the listing tree and download every file not yet mirrored (default)
  count            Crawl only and print the number of files that would be queued

OPTIONS:
  -u, --url <url>            Root listing to mirror (env: BASE_URL)
  -d, --download-dir <dir>   Local mirror root (env: DOWNLOAD_DIR)
  -t, --threads <n>          Concurrent transfers (env: MAX_THREADS, default: 8)
  --timeout <seconds>        Per-request idle timeout (env: TIMEOUT, default: 20)
  --db-file <file>           SQLite ledger of completed downloads (env: DB_FILE, default: downloads.db)
  --user-agent <ua>          User-Agent sent with every request (env: USER_AGENT)
  -r, --region <r...>        Only files whose region tag matches, e.g. -r USA EU JP (env: REGION)
  --crawl-concurrency <n>    Listing pages fetched in parallel (env: CRAWL_CONCURRENCY, default: 4)
  -c, --count                Same as the count action
  -h, --help                 Show this help

EXIT STATUS:
  0 when every file was mirrored or skipped, 1 on any failure, 130 when interrupted.
`);
}

function buildConfig(argv: string[], logger: Logger): { args: ParsedArgs; config: MirrorConfig | null } | null {
  try {
    const args = parseArgs(argv, loadConfig(process.env));
    return { args, config: args.help ? null : resolveConfig(args.raw) };
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      return null;
    }
    throw err;
  }
}

export async function main(argv: string[]): Promise<number> {
  const logger = createLogger("mirror");
  const built = buildConfig(argv, logger);
  if (!built) return 1;
  if (!built.config) {
    printUsage();
    return 0;
  }

  const { args, config } = built;
  const client = new HttpClient({ userAgent: config.userAgent, timeoutMs: config.timeoutSeconds * 1000 });
  const orchestrator = new MirrorOrchestrator(config, { client, logger });

  const controller = new AbortController();
  const interrupt = () => {
    if (controller.signal.aborted) process.exit(130);
    logger.warn("Interrupt received, finishing in-flight transfers (press again to force quit)...");
    controller.abort();
  };
  process.on("SIGINT", interrupt);
  process.on("SIGTERM", interrupt);

  try {
    if (args.action === "count") {
      const result = await orchestrator.count(controller.signal);
      console.log(result.total);
      return result.exitCode;
    }
    const summary = await orchestrator.run(controller.signal);
    return summary.exitCode;
  } finally {
    process.off("SIGINT", interrupt);
    process.off("SIGTERM", interrupt);
  }
}

if (process.argv[1]?.includes(path.basename(__filename))) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(`Fatal: ${describeError(err)}`);
      process.exitCode = 1;
    });
}
