/* ── Cron job entities ── */

export const LIFECYCLES = ["active", "maintenance", "paused", "retired"] as const;
export type Lifecycle = (typeof LIFECYCLES)[number];

export const RESULT_STATUSES = ["success", "failure"] as const;
export type ResultStatus = (typeof RESULT_STATUSES)[number];

/** Alerting status computed on every scrape. Never stored. */
export type DerivedStatus = "success" | "failure" | "missed_deadline" | "maintenance";

export type Labels = Record<string, string>;

export interface Job {
  id: number;
  name: string;
  host: string;
  api_key: string;
  automatic_failure_threshold: number; // seconds since last report
  labels: Labels;
  lifecycle: Lifecycle;
  last_reported_at: string | null;     // watermark, ISO timestamp
  last_status: ResultStatus | null;    // outcome of the result at the watermark
  last_duration: number | null;
  created_at: string;
  updated_at: string;
}

export interface JobResult {
  id: number;
  job_id: number;
  status: ResultStatus;
  duration: number;                    // seconds
  timestamp: string;                   // when the run happened (caller clock)
  labels: Labels;
  output: string | null;
  received_at: string;
}

export type NewJobResult = Omit<JobResult, "id" | "job_id">;

export interface NewJob {
  name: string;
  host: string;
  api_key: string;
  automatic_failure_threshold: number;
  labels: Labels;
  lifecycle: Lifecycle;
}

export type JobPatch = Partial<NewJob>;

export interface JobFilter {
  lifecycle?: Lifecycle;
  labels?: Labels;
}
