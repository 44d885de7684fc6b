import type { MetricRecord } from "./aggregator.js";
import { formatLabels, seriesLabels, type LabelPair } from "./labels.js";
import type { DerivedStatus, Job } from "./types.js";

export const CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

interface Family {
  name: string;
  help: string;
  lines: string[];
}

function family(name: string, help: string): Family {
  return { name, help, lines: [] };
}

export function statusValue(status: DerivedStatus): number {
  switch (status) {
    case "success":
      return 1;
    case "failure":
    case "missed_deadline":
      return 0;
    case "maintenance":
      return -1;
    default: {
      const unhandled: never = status;
      throw new Error(`unhandled derived status: ${String(unhandled)}`);
    }
  }
}

function identity(job: Job): LabelPair[] {
  return [
    ["job_name", job.name],
    ["host", job.host],
  ];
}

/**
 * Prometheus text exposition for a scrape.
 *
 * Families always appear in the same order with their HELP/TYPE header once,
 * and series follow record order, so identical state gives identical bytes.
 */
export async function renderExposition(records: AsyncIterable<MetricRecord> | Iterable<MetricRecord>): Promise<string> {
  const status = family("cronjob_status", "Status of cron job: 1=success, 0=failure or missed deadline, -1=maintenance/paused");
  const lastRun = family("cronjob_last_run_timestamp", "Unix timestamp of the last reported job execution");
  const duration = family("cronjob_duration_seconds", "Duration of the last reported job execution in seconds");
  let total = 0;

  for await (const { job, evaluation, labels } of records) {
    total++;

    const statusLabels = seriesLabels([...identity(job), ["status", evaluation.status]], labels);
    status.lines.push(`cronjob_status${formatLabels(statusLabels)} ${statusValue(evaluation.status)}`);

    if (job.last_reported_at !== null) {
      const seconds = Math.floor(Date.parse(job.last_reported_at) / 1000);
      lastRun.lines.push(`cronjob_last_run_timestamp${formatLabels(identity(job))} ${seconds}`);
    }
    if (job.last_duration !== null) {
      duration.lines.push(`cronjob_duration_seconds${formatLabels(identity(job))} ${job.last_duration}`);
    }
  }

  const totals = family("cronjob_total", "Total number of registered cron jobs");
  totals.lines.push(`cronjob_total ${total}`);

  return [status, lastRun, duration, totals]
    .flatMap((f) => [`# HELP ${f.name} ${f.help}`, `# TYPE ${f.name} gauge`, ...f.lines])
    .join("\n")
    .concat("\n");
}
