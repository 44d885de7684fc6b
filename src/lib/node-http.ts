import type { IncomingMessage, RequestListener, ServerResponse } from "http";
import { PayloadTooLargeError } from "./errors.js";
import { errorResponse } from "./http.js";
import type { Logger } from "./log.js";

export const MAX_BODY_BYTES = 1024 * 1024;

export interface ToWebRequestOptions {
  maxBodyBytes?: number;
}

/**
 * Turns a Node request into a web Request. The body is read as UTF-8 text;
 * bodies over `maxBodyBytes` raise PayloadTooLargeError.
 */
export async function toWebRequest(
  req: IncomingMessage,
  origin: string,
  opts: ToWebRequestOptions = {},
): Promise<Request> {
  const limit = opts.maxBodyBytes ?? MAX_BODY_BYTES;
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    for (const v of Array.isArray(value) ? value : [value]) headers.append(name, v);
  }

  const controller = new AbortController();
  req.once("close", () => {
    if (!req.complete) controller.abort();
  });

  const method = req.method ?? "GET";
  let body: string | undefined;
  if (method !== "GET" && method !== "HEAD") {
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of req) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buf.length;
      if (size > limit) throw new PayloadTooLargeError(limit);
      chunks.push(buf);
    }
    body = Buffer.concat(chunks).toString("utf8");
  }

  return new Request(new URL(req.url ?? "/", origin), { method, headers, body, signal: controller.signal });
}

export async function sendWebResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => res.setHeader(name, value));
  const body = response.body ? Buffer.from(await response.arrayBuffer()) : undefined;
  res.end(body);
}

/** Node `http` listener around a fetch-style handler. */
export function toNodeListener(fetch: (req: Request) => Promise<Response>, log: Logger, origin: string): RequestListener {
  return (req: IncomingMessage, res: ServerResponse) => {
    toWebRequest(req, origin)
      .then(fetch)
      .then((response) => sendWebResponse(res, response))
      .catch((err: unknown) => {
        if (res.headersSent) {
          log.error("failed to serve request", { error: err instanceof Error ? err.message : String(err) });
          res.end();
          return;
        }
        // The unread rest of an oversized body is not drained.
        res.setHeader("Connection", "close");
        return sendWebResponse(res, errorResponse(err, log, "http"));
      })
      .catch((err: unknown) => {
        log.error("failed to send error response", { error: err instanceof Error ? err.message : String(err) });
        res.destroy();
      });
  };
}
