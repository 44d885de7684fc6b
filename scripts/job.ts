/**
 * Manage cron jobs directly in the configured store.
 * Run with: npx tsx scripts/job.ts <command> [options]
 *
 *   add     --name <n> --host <h> [--threshold 3600] [--label k=v]... [--lifecycle active] [--api-key <k>]
 *   list    [--label k=v]... [--lifecycle <l>] [--json] [--show-api-keys]
 *   show    <id> [--json]
 *   update  <id> [--name] [--host] [--threshold] [--label k=v]... [--lifecycle] [--maintenance] [--api-key]
 *   delete  <id>
 */

import { parseArgs } from "util";
import { loadConfig } from "../src/config/server.js";
import { errorMessage, InvalidInputError, NotFoundError } from "../src/lib/errors.js";
import { parseId } from "../src/lib/http.js";
import type { JobStore } from "../src/lib/job-store.js";
import { createJob, getJobOrThrow, presentJob, updateJob } from "../src/lib/jobs.js";
import { parseLabelArgs } from "../src/lib/labels.js";
import { createLogger } from "../src/lib/log.js";
import { createJobPayload, parsePayload, updateJobPayload } from "../src/lib/schemas.js";
import { createStore } from "../src/lib/stores.js";
import { deriveStatus } from "../src/lib/threshold.js";
import { LIFECYCLES, type Job, type Lifecycle } from "../src/lib/types.js";

const options = {
  name: { type: "string", short: "n" },
  host: { type: "string" },
  threshold: { type: "string", short: "t" },
  label: { type: "string", short: "l", multiple: true },
  lifecycle: { type: "string", short: "s" },
  maintenance: { type: "boolean", short: "m" },
  "api-key": { type: "string" },
  json: { type: "boolean", short: "j" },
  "show-api-keys": { type: "boolean" },
} as const;

function parseCli() {
  return parseArgs({ options, allowPositionals: true });
}

type Flags = ReturnType<typeof parseCli>["values"];

function threshold(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new InvalidInputError("threshold must be a positive integer (seconds)");
  return n;
}

function lifecycle(flags: Flags): Lifecycle | undefined {
  if (flags.maintenance) return "maintenance";
  const raw = flags.lifecycle;
  if (raw === undefined) return undefined;
  const match = LIFECYCLES.find((l) => l === raw);
  if (!match) throw new InvalidInputError(`lifecycle must be one of: ${LIFECYCLES.join(", ")}`);
  return match;
}

function printTable(jobs: Job[], showApiKeys: boolean) {
  const now = new Date();
  console.log(
    `${"ID".padEnd(6)} ${"Name".padEnd(24)} ${"Host".padEnd(18)} ${"Lifecycle".padEnd(12)} ${"Status".padEnd(16)} ${"Last report"}`,
  );
  console.log("─".repeat(100));
  for (const job of jobs) {
    const status = job.lifecycle === "retired" ? "-" : deriveStatus(now, job).status;
    console.log(
      `${String(job.id).padEnd(6)} ${job.name.padEnd(24)} ${job.host.padEnd(18)} ${job.lifecycle.padEnd(12)} ${status.padEnd(16)} ${job.last_reported_at ?? "never"}`,
    );
    if (showApiKeys) console.log(`${"".padEnd(6)} key: ${presentJob(job).api_key}`);
  }
  console.log("─".repeat(100));
  console.log(`${jobs.length} job(s)`);
}

async function run(store: JobStore, command: string | undefined, args: string[], flags: Flags, defaultThreshold: number) {
  switch (command) {
    case "add": {
      const payload = parsePayload(createJobPayload, {
        job_name: flags.name,
        host: flags.host,
        api_key: flags["api-key"],
        automatic_failure_threshold: threshold(flags.threshold),
        labels: parseLabelArgs(flags.label ?? []),
        lifecycle: lifecycle(flags),
      });
      const job = await createJob(store, payload, { threshold: defaultThreshold });
      console.log(`✅ Created job ${job.id}: ${job.name}@${job.host}`);
      console.log(`   API key: ${job.api_key}`);
      return;
    }

    case "list": {
      const jobs = await store.listJobs({ labels: parseLabelArgs(flags.label ?? []), lifecycle: lifecycle(flags) });
      if (flags.json) console.log(JSON.stringify(jobs.map((j) => presentJob(j)), null, 2));
      else printTable(jobs, flags["show-api-keys"] ?? false);
      return;
    }

    case "show": {
      const job = await getJobOrThrow(store, parseId(args[0]));
      const latest = await store.latestResult(job.id);
      if (flags.json) {
        console.log(JSON.stringify({ ...presentJob(job), latest_result: latest }, null, 2));
        return;
      }
      const evaluation = deriveStatus(new Date(), job);
      console.log(`Job ${job.id}: ${job.name}@${job.host}`);
      console.log(`  lifecycle:   ${job.lifecycle}`);
      console.log(`  status:      ${job.lifecycle === "retired" ? "-" : evaluation.status}`);
      console.log(`  threshold:   ${job.automatic_failure_threshold}s`);
      console.log(`  last report: ${job.last_reported_at ?? "never"}`);
      if (evaluation.warningRatio !== null) {
        console.log(`  deadline:    ${(evaluation.warningRatio * 100).toFixed(1)}% of threshold used`);
      }
      console.log(`  labels:      ${JSON.stringify(job.labels)}`);
      if (latest) console.log(`  latest:      ${latest.status} at ${latest.timestamp} (${latest.duration}s)`);
      return;
    }

    case "update": {
      const id = parseId(args[0]);
      const payload = parsePayload(updateJobPayload, {
        job_name: flags.name,
        host: flags.host,
        api_key: flags["api-key"],
        automatic_failure_threshold: threshold(flags.threshold),
        labels: flags.label ? parseLabelArgs(flags.label) : undefined,
        lifecycle: lifecycle(flags),
      });
      const job = await updateJob(store, id, payload);
      console.log(`✅ Updated job ${job.id}: ${job.name}@${job.host} (${job.lifecycle})`);
      return;
    }

    case "delete": {
      const id = parseId(args[0]);
      if (!(await store.deleteJob(id))) throw new NotFoundError(`job not found with ID: ${id}`);
      console.log(`✅ Deleted job ${id}`);
      return;
    }

    default:
      throw new InvalidInputError(`unknown command "${command ?? ""}" (expected add, list, show, update or delete)`);
  }
}

async function main() {
  const { values, positionals } = parseCli();
  const [command, ...args] = positionals;

  const config = loadConfig(process.env);
  const store = createStore(config, createLogger({ level: "error", format: "text", subsystem: "job-cli" }));

  try {
    await run(store, command, args, values, config.jobs.defaultThreshold);
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  console.error("❌ Error:", errorMessage(error));
  process.exit(1);
});
