import { TransferError } from "./errors";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  userAgent: string;
  /** Bounds the wait for response headers and every idle gap between body chunks. */
  timeoutMs: number;
  fetch?: FetchLike;
}

export interface Transfer {
  url: string;
  contentLength: number | null;
  body: AsyncIterable<Uint8Array>;
  /** Releases the response and its timer when `body` will not be consumed. */
  cancel(): Promise<void>;
}

export interface ListingSource {
  fetchListing(url: string, signal?: AbortSignal): Promise<string>;
}

export interface TransferSource {
  openTransfer(url: string, signal?: AbortSignal): Promise<Transfer>;
}

interface Watchdog {
  signal: AbortSignal;
  aborted: Promise<never>;
  arm(): void;
  failure(url: string): TransferError;
  dispose(): void;
}

/**
 * Abort controller that fires when the caller's signal aborts or when
 * `timeoutMs` passes without the watchdog being re-armed.
 */
function createWatchdog(timeoutMs: number, outer?: AbortSignal): Watchdog {
  const controller = new AbortController();
  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;

  const onOuterAbort = () => controller.abort(outer?.reason);
  if (outer?.aborted) controller.abort(outer.reason);
  else outer?.addEventListener("abort", onOuterAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    const fire = () => reject(new Error("aborted"));
    if (controller.signal.aborted) fire();
    else controller.signal.addEventListener("abort", fire, { once: true });
  });
  // Rejections are observed through Promise.race; this keeps an unraced one quiet.
  aborted.catch(() => undefined);

  return {
    signal: controller.signal,
    aborted,
    arm() {
      clearTimeout(timer);
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);
    },
    failure(url) {
      return timedOut
        ? new TransferError(`Timed out after ${timeoutMs}ms`, url, { timedOut: true })
        : new TransferError("Transfer aborted", url);
    },
    dispose() {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onOuterAbort);
    },
  };
}

async function* readBody(
  url: string,
  body: Response["body"],
  dog: Watchdog,
): AsyncGenerator<Uint8Array> {
  if (!body) {
    dog.dispose();
    return;
  }
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      dog.arm();
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await Promise.race([reader.read(), dog.aborted]);
      } catch (err) {
        if (dog.signal.aborted) throw dog.failure(url);
        throw new TransferError(`Connection lost: ${err instanceof Error ? err.message : String(err)}`, url, { cause: err });
      }
      if (chunk.done) {
        finished = true;
        return;
      }
      yield chunk.value;
    }
  } finally {
    dog.dispose();
    if (!finished) {
      // The stream already failed or the consumer stopped; its own error is the one reported.
      await reader.cancel().catch(() => undefined);
    }
  }
}

export class HttpClient implements ListingSource, TransferSource {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  private async request(url: string, signal?: AbortSignal): Promise<{ response: Response; dog: Watchdog }> {
    const dog = createWatchdog(this.options.timeoutMs, signal);
    dog.arm();

    let response: Response;
    try {
      response = await Promise.race([
        this.fetchImpl(url, {
          headers: { "User-Agent": this.options.userAgent },
          redirect: "follow",
          signal: dog.signal,
        }),
        dog.aborted,
      ]);
    } catch (err) {
      const failure = dog.signal.aborted
        ? dog.failure(url)
        : new TransferError(`Request failed: ${err instanceof Error ? err.message : String(err)}`, url, { cause: err });
      dog.dispose();
      throw failure;
    }

    if (!response.ok) {
      dog.dispose();
      await response.body?.cancel();
      throw new TransferError(`HTTP ${response.status}`, url, { status: response.status });
    }

    return { response, dog };
  }

  async fetchListing(url: string, signal?: AbortSignal): Promise<string> {
    const { response, dog } = await this.request(url, signal);
    const chunks: Uint8Array[] = [];
    for await (const chunk of readBody(url, response.body, dog)) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks).toString("utf-8");
  }

  async openTransfer(url: string, signal?: AbortSignal): Promise<Transfer> {
    const { response, dog } = await this.request(url, signal);
    const declared = parseInt(response.headers.get("content-length") || "", 10);
    return {
      url,
      contentLength: Number.isNaN(declared) ? null : declared,
      body: readBody(url, response.body, dog),
      async cancel() {
        dog.dispose();
        // A started body holds the reader lock and is cancelled by readBody itself
        if (response.body && !response.body.locked) {
          await response.body.cancel().catch(() => undefined);
        }
      },
    };
  }
}
