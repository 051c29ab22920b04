import { z } from "zod";
import { ConfigError } from "./errors";
import { resolveRegions } from "./region-filter";

export const DEFAULT_MAX_THREADS = 8;
export const DEFAULT_TIMEOUT_SECONDS = 20;
export const DEFAULT_DB_FILE = "downloads.db";
export const DEFAULT_USER_AGENT = "listing-mirror/1.0 (set USER_AGENT to identify yourself)";
export const DEFAULT_CRAWL_CONCURRENCY = 4;
export const DEFAULT_IO_ERROR_LIMIT = 25;

export type MirrorAction = "run" | "count";

/** Unvalidated settings as read from the environment and the command line. */
export interface RawConfig {
  baseUrl?: string;
  downloadDir?: string;
  maxThreads?: string;
  timeoutSeconds?: string;
  dbFile?: string;
  userAgent?: string;
  regions: string[];
  crawlConcurrency?: string;
  crawlErrorTolerance?: string;
  ioErrorLimit?: string;
}

const configSchema = z
  .object({
    baseUrl: z
      .string({ required_error: "no base URL; use -u/--url or set BASE_URL" })
      .url("base URL must be an absolute URL")
      .refine((u) => /^https?:\/\//i.test(u), "base URL must use http or https"),
    downloadDir: z.string({ required_error: "no download directory; use -d/--download-dir or set DOWNLOAD_DIR" }).min(1),
    maxThreads: z.coerce.number().int().min(1).max(128),
    timeoutSeconds: z.coerce.number().positive(),
    dbFile: z.string().min(1),
    userAgent: z.string().min(1),
    regions: z.array(z.string()),
    crawlConcurrency: z.coerce.number().int().min(1),
    crawlErrorTolerance: z.coerce.number().int().min(0),
    ioErrorLimit: z.coerce.number().int().min(0),
  })
  .transform((c) => ({
    ...c,
    baseUrl: c.baseUrl.endsWith("/") ? c.baseUrl : `${c.baseUrl}/`,
    regions: resolveRegions(c.regions),
  }));

export type MirrorConfig = Readonly<z.infer<typeof configSchema>>;

function splitList(value: string | undefined): string[] {
  return value ? value.split(",").map((v) => v.trim()).filter(Boolean) : [];
}

/** Environment values with defaults applied. Empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv): RawConfig {
  const read = (key: string) => env[key] || undefined;
  return {
    baseUrl: read("BASE_URL"),
    downloadDir: read("DOWNLOAD_DIR"),
    maxThreads: read("MAX_THREADS") ?? String(DEFAULT_MAX_THREADS),
    timeoutSeconds: read("TIMEOUT") ?? String(DEFAULT_TIMEOUT_SECONDS),
    dbFile: read("DB_FILE") ?? DEFAULT_DB_FILE,
    userAgent: read("USER_AGENT") ?? DEFAULT_USER_AGENT,
    regions: splitList(read("REGION")),
    crawlConcurrency: read("CRAWL_CONCURRENCY") ?? String(DEFAULT_CRAWL_CONCURRENCY),
    crawlErrorTolerance: read("CRAWL_ERROR_TOLERANCE") ?? "0",
    ioErrorLimit: read("IO_ERROR_LIMIT") ?? String(DEFAULT_IO_ERROR_LIMIT),
  };
}

export interface ParsedArgs {
  action: MirrorAction;
  help: boolean;
  raw: RawConfig;
}

const VALUE_FLAGS = new Map<string, keyof Omit<RawConfig, "regions">>([
  ["-u", "baseUrl"],
  ["--url", "baseUrl"],
  ["-d", "downloadDir"],
  ["--download-dir", "downloadDir"],
  ["-t", "maxThreads"],
  ["--threads", "maxThreads"],
  ["--timeout", "timeoutSeconds"],
  ["--db-file", "dbFile"],
  ["--user-agent", "userAgent"],
  ["--crawl-concurrency", "crawlConcurrency"],
]);

/** Command-line flags override the environment-derived `base`. */
export function parseArgs(argv: string[], base: RawConfig): ParsedArgs {
  const raw: RawConfig = { ...base, regions: [...base.regions] };
  let action: MirrorAction = "run";
  let help = false;
  let cliRegions: string[] | null = null;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const key = VALUE_FLAGS.get(arg);

    if (key) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("-")) {
        throw new ConfigError([`${arg} needs a value`]);
      }
      raw[key] = value;
      i++;
    } else if (arg === "-r" || arg === "--region") {
      cliRegions = [];
      while (i + 1 < argv.length && !argv[i + 1].startsWith("-")) {
        cliRegions.push(...splitList(argv[++i]));
      }
    } else if (arg === "-c" || arg === "--count" || arg === "count") {
      action = "count";
    } else if (arg === "run") {
      action = "run";
    } else if (arg === "-h" || arg === "--help") {
      help = true;
    } else {
      throw new ConfigError([`unknown argument: ${arg}`]);
    }
  }

  if (cliRegions !== null) raw.regions = cliRegions;
  return { action, help, raw };
}

export function resolveConfig(raw: RawConfig): MirrorConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  return Object.freeze(parsed.data);
}
