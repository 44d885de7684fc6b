import { collect } from "../src/lib/aggregator.js";
import { errorResponse, json, type Context, type RouteConfig } from "../src/lib/http.js";
import type { DerivedStatus } from "../src/lib/types.js";

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Headers": "Content-Type",
  "Access-Control-Allow-Methods": "GET, OPTIONS",
};

/**
 * GET /api/status
 * Derived status of every non-retired job, for dashboards. Adds how close each
 * job is to its deadline, which the metrics leave out.
 *
 * Query params:
 *   status — only jobs with this derived status (e.g. missed_deadline)
 */
export default async (req: Request, ctx: Context) => {
  if (req.method === "OPTIONS") {
    return new Response("", { status: 200, headers: CORS_HEADERS });
  }

  try {
    const url = new URL(req.url);
    const only = url.searchParams.get("status");
    const summary: Record<DerivedStatus, number> = { success: 0, failure: 0, missed_deadline: 0, maintenance: 0 };
    const jobs = [];

    for await (const { job, evaluation } of collect(ctx.store, ctx.now(), { batchSize: ctx.config.metrics.scrapeBatchSize })) {
      summary[evaluation.status]++;
      if (only && evaluation.status !== only) continue;
      jobs.push({
        id: job.id,
        job_name: job.name,
        host: job.host,
        lifecycle: job.lifecycle,
        status: evaluation.status,
        last_reported_at: job.last_reported_at,
        automatic_failure_threshold: job.automatic_failure_threshold,
        elapsed_seconds: evaluation.elapsedSeconds,
        warning_ratio: evaluation.warningRatio,
        approaching_deadline: evaluation.approachingDeadline,
        labels: job.labels,
      });
    }

    return json({ generated_at: ctx.now().toISOString(), summary, count: jobs.length, jobs }, 200, CORS_HEADERS);
  } catch (error) {
    return errorResponse(error, ctx.log, "status");
  }
};

export const config: RouteConfig = {
  path: "/api/status",
  method: ["GET", "OPTIONS"],
};
