import type { DerivedStatus, Job } from "./types.js";

/** Ratio of elapsed time to threshold at which a job counts as close to its deadline. */
export const WARNING_RATIO = 0.8;

export interface Evaluation {
  status: DerivedStatus;
  elapsedSeconds: number | null;
  warningRatio: number | null;
  approachingDeadline: boolean;
}

export type EvaluatedJob = Pick<
  Job,
  "lifecycle" | "last_reported_at" | "last_status" | "automatic_failure_threshold"
>;

/**
 * Current alerting status of a job.
 *
 * Precedence: maintenance/paused lifecycle, then never reported, then a stale
 * watermark, then the outcome of the latest result. Pure and total: a
 * watermark in the future counts as zero elapsed time.
 */
export function deriveStatus(now: Date, job: EvaluatedJob): Evaluation {
  const reportedMs = job.last_reported_at === null ? null : Date.parse(job.last_reported_at);
  const elapsedSeconds =
    reportedMs === null || Number.isNaN(reportedMs) ? null : Math.max(0, now.getTime() - reportedMs) / 1000;
  const warningRatio = elapsedSeconds === null ? null : elapsedSeconds / job.automatic_failure_threshold;
  const approachingDeadline = warningRatio !== null && warningRatio >= WARNING_RATIO && warningRatio <= 1;

  const evaluate = (status: DerivedStatus): Evaluation => ({
    status,
    elapsedSeconds,
    warningRatio,
    approachingDeadline,
  });

  if (job.lifecycle === "maintenance" || job.lifecycle === "paused") return evaluate("maintenance");
  if (elapsedSeconds === null || job.last_status === null) return evaluate("missed_deadline");
  if (elapsedSeconds > job.automatic_failure_threshold) return evaluate("missed_deadline");
  return evaluate(job.last_status);
}
