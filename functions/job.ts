import { requireAdmin } from "../src/lib/auth.js";
import { errorResponse, json, parseId, type Context, type RouteConfig } from "../src/lib/http.js";
import { getJobOrThrow, presentJob, updateJob } from "../src/lib/jobs.js";
import { NotFoundError } from "../src/lib/errors.js";
import { parsePayload, readJson, updateJobPayload } from "../src/lib/schemas.js";

/**
 * /api/job/:id  (admin)
 *
 * GET    - Job details with its latest result
 * PUT    { job_name?, host?, automatic_failure_threshold?, labels?, lifecycle?, api_key? }
 *        - Update only the fields given. lifecycle "retired" stops metrics and submissions.
 * DELETE - Remove the job and its results
 */
export default async (req: Request, ctx: Context) => {
  try {
    await requireAdmin(req, ctx.store, ctx.config);
    const id = parseId(ctx.params.id);

    if (req.method === "GET") {
      const job = await getJobOrThrow(ctx.store, id);
      const latest = await ctx.store.latestResult(id);
      return json({ ...presentJob(job), latest_result: latest });
    }

    if (req.method === "PUT") {
      const payload = parsePayload(updateJobPayload, await readJson(req));
      const job = await updateJob(ctx.store, id, payload);
      ctx.log.info("job updated", { job_id: job.id, job_name: job.name, host: job.host, lifecycle: job.lifecycle });
      return json(presentJob(job));
    }

    const removed = await ctx.store.deleteJob(id);
    if (!removed) throw new NotFoundError(`job not found with ID: ${id}`);
    ctx.log.info("job deleted", { job_id: id });
    return new Response(null, { status: 204 });
  } catch (error) {
    return errorResponse(error, ctx.log, "job");
  }
};

export const config: RouteConfig = {
  path: "/api/job/:id",
  method: ["GET", "PUT", "DELETE"],
};
