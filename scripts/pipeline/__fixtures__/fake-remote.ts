import { ReadableStream } from "stream/web";
import type { FetchLike } from "../http";
import type { Logger } from "../log";

export const ROOT = "http://mirror.test/files/";

type Route =
  | { kind: "body"; status: number; body: string | Uint8Array }
  | { kind: "hang" }
  | { kind: "stall"; head: Uint8Array }
  | { kind: "reset"; head: Uint8Array };

/** Apache-style autoindex page with the usual sort and parent links. */
export function listingPage(hrefs: string[]): string {
  const rows = hrefs.map((href) => `<tr><td><a href="${href}">${href}</a></td><td>-</td></tr>`);
  return `<!DOCTYPE html>
<html><head><title>Index of /files</title></head><body>
<h1>Index of /files</h1>
<table>
<tr><th><a href="?C=N;O=D">Name</a></th><th><a href="?C=S;O=A">Size</a></th></tr>
<tr><td><a href="../">Parent Directory</a></td></tr>
${rows.join("\n")}
</table></body></html>`;
}

/** In-process stand-in for an HTTP server exposing directory listings. */
export class FakeRemote {
  readonly requests: string[] = [];
  readonly userAgents: string[] = [];
  /** URLs whose held-open body was cancelled by the client. */
  readonly cancelled: string[] = [];
  private readonly routes = new Map<string, Route>();

  constructor(readonly root = ROOT) {}

  url(relative: string): string {
    return new URL(relative, this.root).href;
  }

  listing(dir: string, hrefs: string[]): this {
    this.routes.set(this.url(dir), { kind: "body", status: 200, body: listingPage(hrefs) });
    return this;
  }

  file(filePath: string, body: string | Uint8Array): this {
    this.routes.set(this.url(filePath), { kind: "body", status: 200, body });
    return this;
  }

  status(filePath: string, status: number): this {
    this.routes.set(this.url(filePath), { kind: "body", status, body: `status ${status}` });
    return this;
  }

  /** Never answers. */
  hang(filePath: string): this {
    this.routes.set(this.url(filePath), { kind: "hang" });
    return this;
  }

  /** Sends `head` and then goes silent without closing the body. */
  stall(filePath: string, head: Uint8Array): this {
    this.routes.set(this.url(filePath), { kind: "stall", head });
    return this;
  }

  /** Sends `head` and then drops the connection. */
  reset(filePath: string, head: Uint8Array): this {
    this.routes.set(this.url(filePath), { kind: "reset", head });
    return this;
  }

  hits(relative: string): number {
    const url = this.url(relative);
    return this.requests.filter((r) => r === url).length;
  }

  fetch: FetchLike = async (url, init) => {
    this.requests.push(url);
    this.userAgents.push(new Headers(init.headers).get("user-agent") ?? "");
    const route = this.routes.get(url);

    if (!route) return new Response("not found", { status: 404 });

    switch (route.kind) {
      case "body":
        return new Response(route.body, { status: route.status });
      case "hang":
        return new Promise<Response>((_, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        });
      case "stall":
        return new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.enqueue(route.head);
            },
            cancel: () => {
              this.cancelled.push(url);
            },
          }),
        );
      case "reset":
        return new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.enqueue(route.head);
              controller.error(new Error("socket hang up"));
            },
          }),
        );
    }
  };
}

export function memoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(message),
    warn: (message) => lines.push(message),
    error: (message) => lines.push(message),
  };
}
