import { collect } from "../src/lib/aggregator.js";
import { CONTENT_TYPE, renderExposition } from "../src/lib/exposition.js";
import { errorResponse, type Context, type RouteConfig } from "../src/lib/http.js";

/**
 * GET /metrics
 * Prometheus scrape endpoint. Status is derived fresh on every request; when
 * the store fails mid-scrape the whole response is a 503, never a partial page.
 */
export default async (req: Request, ctx: Context) => {
  try {
    const records = collect(ctx.store, ctx.now(), {
      batchSize: ctx.config.metrics.scrapeBatchSize,
      signal: req.signal,
    });
    const body = await renderExposition(records);
    return new Response(body, { status: 200, headers: { "Content-Type": CONTENT_TYPE } });
  } catch (error) {
    if (req.signal.aborted) {
      ctx.log.debug("scrape aborted by client");
      return new Response(null, { status: 499 });
    }
    return errorResponse(error, ctx.log, "metrics");
  }
};

export const config: RouteConfig = {
  path: "/metrics",
  method: ["GET"],
};
