import type { AppConfig } from "../config/server.js";
import { InvalidInputError, isServiceError } from "./errors.js";
import type { JobStore } from "./job-store.js";
import type { Logger } from "./log.js";

/** What every function receives besides the request. Built once in main. */
export interface Context {
  params: Record<string, string>;
  store: JobStore;
  config: AppConfig;
  log: Logger;
  now: () => Date;
}

export type Handler = (req: Request, ctx: Context) => Promise<Response>;

/**
 * Stands in for the functions host's `Config`: each `functions/<name>.ts`
 * plays the part of `netlify/functions/<name>.mts`, exporting the handler as
 * default and its route as `config`. `createApp` does the host's dispatch.
 */
export interface RouteConfig {
  path: string;
  method: string[];
}

export interface FunctionModule {
  default: Handler;
  config: RouteConfig;
}

export function json(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data, null, 2), {
    status,
    headers: { ...headers, "Content-Type": "application/json" },
  });
}

/** Maps service errors to their status; anything else is logged and becomes a 500. */
export function errorResponse(err: unknown, log: Logger, where: string): Response {
  if (isServiceError(err)) {
    if (err.code === "store_unavailable") {
      log.error(`${where}: ${err.message}`, { cause: err.cause instanceof Error ? err.cause.message : undefined });
    }
    return json({ error: err.message, code: err.code }, err.status);
  }

  log.error(`${where} error`, { error: err instanceof Error ? (err.stack ?? err.message) : String(err) });
  return json({ error: "internal server error", code: "internal" }, 500);
}

export function parseId(raw: string | undefined): number {
  const id = Number(raw);
  if (!raw || !Number.isSafeInteger(id) || id < 1) {
    throw new InvalidInputError("invalid job ID format (must be a positive integer)");
  }
  return id;
}

/** Matches `/api/job/:id` style patterns; returns the captured params or null. */
export function matchPath(pattern: string, pathname: string): Record<string, string> | null {
  const want = pattern.split("/").filter(Boolean);
  const got = pathname.split("/").filter(Boolean);
  if (want.length !== got.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < want.length; i++) {
    if (want[i].startsWith(":")) {
      const value = safeDecode(got[i]);
      if (value === null) return null;
      params[want[i].slice(1)] = value;
    } else if (want[i] !== got[i]) {
      return null;
    }
  }
  return params;
}

function safeDecode(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}
