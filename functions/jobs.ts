import { requireAdmin } from "../src/lib/auth.js";
import { InvalidInputError } from "../src/lib/errors.js";
import { errorResponse, json, type Context, type RouteConfig } from "../src/lib/http.js";
import { createJob, presentJob } from "../src/lib/jobs.js";
import { createJobPayload, parsePayload, readJson } from "../src/lib/schemas.js";
import { LIFECYCLES, type Labels, type Lifecycle } from "../src/lib/types.js";

/**
 * /api/job  (admin)
 *
 * GET   - List jobs (filters: ?lifecycle=, ?label.<key>=<value>)
 * POST  { job_name, host, automatic_failure_threshold?, labels?, lifecycle?, api_key? }
 *       - Register a job. The response is the only place the full API key is shown.
 */
export default async (req: Request, ctx: Context) => {
  try {
    await requireAdmin(req, ctx.store, ctx.config);

    if (req.method === "GET") {
      const url = new URL(req.url);
      const labels: Labels = {};
      for (const [key, value] of url.searchParams) {
        if (key.startsWith("label.")) labels[key.slice("label.".length)] = value;
      }

      const lifecycle = url.searchParams.get("lifecycle");
      if (lifecycle !== null && !isLifecycle(lifecycle)) {
        throw new InvalidInputError(`lifecycle must be one of: ${LIFECYCLES.join(", ")}`);
      }

      const jobs = await ctx.store.listJobs({ labels, lifecycle: lifecycle ?? undefined });
      return json({ count: jobs.length, jobs: jobs.map((j) => presentJob(j)) });
    }

    const payload = parsePayload(createJobPayload, await readJson(req));
    const job = await createJob(ctx.store, payload, { threshold: ctx.config.jobs.defaultThreshold });
    ctx.log.info("job created", { job_id: job.id, job_name: job.name, host: job.host, lifecycle: job.lifecycle });
    return json(presentJob(job, { revealApiKey: true }), 201);
  } catch (error) {
    return errorResponse(error, ctx.log, "jobs");
  }
};

function isLifecycle(value: string): value is Lifecycle {
  return LIFECYCLES.some((l) => l === value);
}

export const config: RouteConfig = {
  path: "/api/job",
  method: ["GET", "POST"],
};
