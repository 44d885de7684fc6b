import type { Credential } from "./auth.js";
import { ConflictError, ForbiddenError, NotFoundError } from "./errors.js";
import type { AppendOutcome, JobStore } from "./job-store.js";
import type { Logger } from "./log.js";
import type { JobResultPayload } from "./schemas.js";

export interface IngestDeps {
  store: JobStore;
  now: () => Date;
  log?: Logger;
}

/**
 * Records one job result.
 *
 * A job key may only report for its own (name, host); admin keys may report
 * for any job. Retired jobs accept nothing. The result and the watermark are
 * written together by the store, so a failure leaves no trace.
 */
export async function ingestResult(
  deps: IngestDeps,
  credential: Credential,
  payload: JobResultPayload,
): Promise<AppendOutcome> {
  const job = await deps.store.get(payload.job_name, payload.host);
  if (!job) throw new NotFoundError(`job not found: ${payload.job_name}@${payload.host}`);

  if (credential.kind === "job" && credential.jobId !== job.id) {
    throw new ForbiddenError("job result does not match authenticated job");
  }
  if (job.lifecycle === "retired") {
    throw new ConflictError(`job is retired: ${job.name}@${job.host}`);
  }

  const receivedAt = deps.now().toISOString();
  const outcome = await deps.store.appendResult(job.id, {
    status: payload.status,
    duration: payload.duration ?? 0,
    timestamp: payload.timestamp ?? receivedAt,
    labels: { ...job.labels, ...payload.labels },
    output: payload.output ?? null,
    received_at: receivedAt,
  });

  deps.log?.debug("job result recorded", {
    job_id: job.id,
    job_name: job.name,
    host: job.host,
    status: payload.status,
    watermark: outcome.lastReportedAt,
    late: outcome.lastReportedAt !== outcome.result.timestamp,
  });

  return outcome;
}
