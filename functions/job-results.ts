import { requireAdmin } from "../src/lib/auth.js";
import { errorResponse, json, parseId, type Context, type RouteConfig } from "../src/lib/http.js";
import { getJobOrThrow } from "../src/lib/jobs.js";

/**
 * GET /api/job/:id/results  (admin)
 * Most recent results first, by run timestamp.
 *
 * Query params:
 *   limit — max results (default 20, max 100)
 */
export default async (req: Request, ctx: Context) => {
  try {
    await requireAdmin(req, ctx.store, ctx.config);
    const id = parseId(ctx.params.id);
    await getJobOrThrow(ctx.store, id);

    const url = new URL(req.url);
    const requested = parseInt(url.searchParams.get("limit") || "20", 10);
    const limit = Number.isNaN(requested) ? 20 : Math.min(Math.max(requested, 1), 100);

    const results = await ctx.store.listResults(id, limit);
    return json({ job_id: id, count: results.length, limit, results });
  } catch (error) {
    return errorResponse(error, ctx.log, "job-results");
  }
};

export const config: RouteConfig = {
  path: "/api/job/:id/results",
  method: ["GET"],
};
