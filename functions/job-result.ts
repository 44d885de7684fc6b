import { requireCredential } from "../src/lib/auth.js";
import { ingestResult } from "../src/lib/ingest.js";
import { errorResponse, json, type Context, type RouteConfig } from "../src/lib/http.js";
import { jobResultPayload, parsePayload, readJson } from "../src/lib/schemas.js";

/**
 * POST /api/job-result
 *
 * Body: { job_name, host, status: "success" | "failure", labels?, duration?, timestamp?, output? }
 * Auth: the job's own key in X-API-Key (or an admin key).
 *
 * 201 {} on success. 400 bad payload, 401 no key, 403 key of another job,
 * 404 unknown job, 409 retired job, 503 store down.
 */
export default async (req: Request, ctx: Context) => {
  try {
    const credential = await requireCredential(req, ctx.store, ctx.config);
    const payload = parsePayload(jobResultPayload, await readJson(req));
    await ingestResult({ store: ctx.store, now: ctx.now, log: ctx.log }, credential, payload);
    return json({}, 201);
  } catch (error) {
    return errorResponse(error, ctx.log, "job-result");
  }
};

export const config: RouteConfig = {
  path: "/api/job-result",
  method: ["POST"],
};
