import * as docs from "../functions/docs.js";
import * as health from "../functions/health.js";
import * as job from "../functions/job.js";
import * as jobResult from "../functions/job-result.js";
import * as jobResults from "../functions/job-results.js";
import * as jobs from "../functions/jobs.js";
import * as metrics from "../functions/metrics.js";
import * as status from "../functions/status.js";
import type { AppConfig } from "./config/server.js";
import { errorResponse, json, matchPath, type Context, type FunctionModule } from "./lib/http.js";
import type { JobStore } from "./lib/job-store.js";
import type { Logger } from "./lib/log.js";

export interface AppDeps {
  config: AppConfig;
  store: JobStore;
  log: Logger;
  now?: () => Date;
}

export interface App {
  fetch(req: Request): Promise<Response>;
}

// More specific paths first.
export const FUNCTIONS: FunctionModule[] = [jobResult, metrics, status, jobResults, job, jobs, health, docs];

/**
 * Routes requests to the functions by their `config.path`, the way a
 * functions host would. The metrics path comes from config.
 */
export function createApp(deps: AppDeps): App {
  const now = deps.now ?? (() => new Date());
  const log = deps.log.child("http");

  const routes = FUNCTIONS.map((fn) => ({
    handler: fn.default,
    path: fn === metrics ? deps.config.metrics.path : fn.config.path,
    method: fn.config.method,
  }));

  async function dispatch(req: Request): Promise<Response> {
    const { pathname } = new URL(req.url);
    let allowed: string[] | null = null;

    for (const route of routes) {
      const params = matchPath(route.path, pathname);
      if (!params) continue;
      if (!route.method.includes(req.method)) {
        allowed = route.method;
        continue;
      }

      const ctx: Context = { params, store: deps.store, config: deps.config, log: deps.log, now };
      return route.handler(req, ctx);
    }

    if (allowed) {
      return json({ error: "method not allowed", code: "method_not_allowed" }, 405, { Allow: allowed.join(", ") });
    }
    return json({ error: "not found", code: "not_found" }, 404);
  }

  return {
    async fetch(req) {
      const started = performance.now();
      let res: Response;
      try {
        res = await dispatch(req);
      } catch (error) {
        res = errorResponse(error, log, "router");
      }
      log.info("http request", {
        method: req.method,
        path: new URL(req.url).pathname,
        status: res.status,
        duration_ms: Math.round(performance.now() - started),
      });
      return res;
    },
  };
}
