import type { JobStore } from "./job-store.js";
import { deriveStatus, type Evaluation } from "./threshold.js";
import type { Job, Labels } from "./types.js";

export interface MetricRecord {
  job: Job;
  evaluation: Evaluation;
  /** Label set exported on the job's status series. */
  labels: Labels;
}

export interface CollectOptions {
  batchSize?: number;
  signal?: AbortSignal;
}

/**
 * Evaluates every non-retired job at `now`, ascending by job id.
 *
 * Reads the store one page at a time and never touches per-job results: the
 * job record already carries the outcome at its watermark.
 */
export async function* collect(store: JobStore, now: Date, opts: CollectOptions = {}): AsyncGenerator<MetricRecord> {
  for await (const page of store.listActive({ batchSize: opts.batchSize, signal: opts.signal })) {
    for (const job of page) {
      if (job.lifecycle === "retired") continue;
      yield { job, evaluation: deriveStatus(now, job), labels: job.labels };
    }
  }
}
