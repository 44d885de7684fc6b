import { generateApiKey, maskApiKey } from "./api-key.js";
import { NotFoundError } from "./errors.js";
import type { JobStore } from "./job-store.js";
import type { CreateJobPayload, UpdateJobPayload } from "./schemas.js";
import type { Job, JobPatch, JobResult } from "./types.js";

export interface JobView {
  id: number;
  job_name: string;
  host: string;
  api_key: string;
  automatic_failure_threshold: number;
  labels: Record<string, string>;
  lifecycle: Job["lifecycle"];
  last_reported_at: string | null;
  last_status: Job["last_status"];
  last_duration: number | null;
  created_at: string;
  updated_at: string;
  latest_result?: JobResult | null;
}

/** Wire shape of a job. The API key is masked unless asked for. */
export function presentJob(job: Job, opts: { revealApiKey?: boolean } = {}): JobView {
  return {
    id: job.id,
    job_name: job.name,
    host: job.host,
    api_key: opts.revealApiKey ? job.api_key : maskApiKey(job.api_key),
    automatic_failure_threshold: job.automatic_failure_threshold,
    labels: job.labels,
    lifecycle: job.lifecycle,
    last_reported_at: job.last_reported_at,
    last_status: job.last_status,
    last_duration: job.last_duration,
    created_at: job.created_at,
    updated_at: job.updated_at,
  };
}

export async function createJob(
  store: JobStore,
  payload: CreateJobPayload,
  defaults: { threshold: number },
): Promise<Job> {
  return store.createJob({
    name: payload.job_name,
    host: payload.host,
    api_key: payload.api_key ?? generateApiKey(),
    automatic_failure_threshold: payload.automatic_failure_threshold ?? defaults.threshold,
    labels: payload.labels ?? {},
    lifecycle: payload.lifecycle ?? "active",
  });
}

/** Applies only the fields present in the payload. */
export async function updateJob(store: JobStore, id: number, payload: UpdateJobPayload): Promise<Job> {
  const patch: JobPatch = {};
  if (payload.job_name !== undefined) patch.name = payload.job_name;
  if (payload.host !== undefined) patch.host = payload.host;
  if (payload.api_key !== undefined) patch.api_key = payload.api_key;
  if (payload.automatic_failure_threshold !== undefined) {
    patch.automatic_failure_threshold = payload.automatic_failure_threshold;
  }
  if (payload.labels !== undefined) patch.labels = payload.labels;
  if (payload.lifecycle !== undefined) patch.lifecycle = payload.lifecycle;

  const updated = await store.updateJob(id, patch);
  if (!updated) throw new NotFoundError(`job not found with ID: ${id}`);
  return updated;
}

export async function getJobOrThrow(store: JobStore, id: number): Promise<Job> {
  const job = await store.getById(id);
  if (!job) throw new NotFoundError(`job not found with ID: ${id}`);
  return job;
}
