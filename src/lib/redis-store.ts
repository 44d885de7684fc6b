import type { Redis } from "ioredis";
import { z } from "zod";
import { ConflictError, NotFoundError, StoreUnavailableError, isServiceError } from "./errors.js";
import { DEFAULT_BATCH_SIZE, identityKey, type AppendOutcome, type JobStore, type ListActiveOptions } from "./job-store.js";
import { matchesLabels } from "./labels.js";
import {
  LIFECYCLES,
  RESULT_STATUSES,
  type Job,
  type JobFilter,
  type JobPatch,
  type JobResult,
  type NewJob,
  type NewJobResult,
} from "./types.js";

/* ── Key helpers ── */
export function keys(prefix: string) {
  return {
    job: (id: number | string) => `${prefix}job:${id}`,
    jobPrefix: () => `${prefix}job:`,
    jobsIdx: () => `${prefix}idx:jobs`,
    activeIdx: () => `${prefix}idx:jobs:active`,
    identityIdx: () => `${prefix}idx:job_identity`,
    apiKeyIdx: () => `${prefix}idx:job_api_key`,
    results: (id: number) => `${prefix}results:${id}`,
    jobSeq: () => `${prefix}seq:job`,
    resultSeq: () => `${prefix}seq:result`,
  };
}

/* ── Lua scripts ── */

// KEYS: seq, all idx, active idx, identity idx, api key idx
// ARGV: identity, api_key, name, host, threshold, labels, lifecycle, now, job key prefix
const CREATE_JOB = `
local holder = redis.call('HGET', KEYS[4], ARGV[1])
local holderLive = false
if holder then
  local state = redis.call('HGET', ARGV[9] .. holder, 'lifecycle')
  holderLive = state and state ~= 'retired'
end
if holderLive and ARGV[7] ~= 'retired' then return -1 end
if redis.call('HEXISTS', KEYS[5], ARGV[2]) == 1 then return -2 end
local id = string.format('%d', redis.call('INCR', KEYS[1]))
redis.call('HSET', ARGV[9] .. id,
  'id', id, 'name', ARGV[3], 'host', ARGV[4], 'api_key', ARGV[2],
  'automatic_failure_threshold', ARGV[5], 'labels', ARGV[6], 'lifecycle', ARGV[7],
  'last_reported_at', '', 'last_reported_ms', '', 'last_status', '', 'last_duration', '',
  'created_at', ARGV[8], 'updated_at', ARGV[8])
redis.call('ZADD', KEYS[2], id, id)
if ARGV[7] ~= 'retired' then redis.call('ZADD', KEYS[3], id, id) end
if not holderLive then redis.call('HSET', KEYS[4], ARGV[1], id) end
redis.call('HSET', KEYS[5], ARGV[2], id)
return id
`;

// KEYS: job hash, results zset, result seq
// ARGV: timestamp ms, timestamp iso, status, duration, result json
const APPEND_RESULT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return false end
local id = redis.call('INCR', KEYS[3])
redis.call('ZADD', KEYS[2], ARGV[1], string.format('%016d', id) .. ':' .. ARGV[5])
local cur = redis.call('HGET', KEYS[1], 'last_reported_ms')
if (not cur) or cur == '' or tonumber(ARGV[1]) >= tonumber(cur) then
  redis.call('HSET', KEYS[1], 'last_reported_ms', ARGV[1], 'last_reported_at', ARGV[2],
    'last_status', ARGV[3], 'last_duration', ARGV[4])
end
return {string.format('%d', id), redis.call('HGET', KEYS[1], 'last_reported_at')}
`;

// KEYS: job hash, active idx, identity idx, api key idx
// ARGV: id, expected name, expected host, expected api_key, old identity, new identity,
//       name, host, api_key, threshold, labels, lifecycle, now, job key prefix
const UPDATE_JOB = `
local cur = redis.call('HMGET', KEYS[1], 'name', 'host', 'api_key')
if not cur[1] then return 0 end
if cur[1] ~= ARGV[2] or cur[2] ~= ARGV[3] or cur[3] ~= ARGV[4] then return -3 end
local holder = redis.call('HGET', KEYS[3], ARGV[6])
local holderLive = false
if holder and holder ~= ARGV[1] then
  local state = redis.call('HGET', ARGV[14] .. holder, 'lifecycle')
  holderLive = state and state ~= 'retired'
end
if holderLive and ARGV[12] ~= 'retired' then return -1 end
if ARGV[9] ~= ARGV[4] then
  local owner = redis.call('HGET', KEYS[4], ARGV[9])
  if owner and owner ~= ARGV[1] then return -2 end
end
redis.call('HSET', KEYS[1],
  'name', ARGV[7], 'host', ARGV[8], 'api_key', ARGV[9],
  'automatic_failure_threshold', ARGV[10], 'labels', ARGV[11], 'lifecycle', ARGV[12],
  'updated_at', ARGV[13])
if ARGV[12] ~= 'retired' then
  redis.call('ZADD', KEYS[2], ARGV[1], ARGV[1])
else
  redis.call('ZREM', KEYS[2], ARGV[1])
end
if ARGV[5] ~= ARGV[6] and redis.call('HGET', KEYS[3], ARGV[5]) == ARGV[1] then
  redis.call('HDEL', KEYS[3], ARGV[5])
end
if not holderLive then redis.call('HSET', KEYS[3], ARGV[6], ARGV[1]) end
if ARGV[9] ~= ARGV[4] then
  redis.call('HDEL', KEYS[4], ARGV[4])
  redis.call('HSET', KEYS[4], ARGV[9], ARGV[1])
end
return 1
`;

// KEYS: job hash, results zset, all idx, active idx, identity idx, api key idx
// ARGV: id, identity, name, host, job key prefix
// When the deleted job held the identity, it passes to the newest remaining
// job with the same name and host, live ones first.
const DELETE_JOB = `
local key = redis.call('HGET', KEYS[1], 'api_key')
if not key then return 0 end
redis.call('DEL', KEYS[1], KEYS[2])
redis.call('ZREM', KEYS[3], ARGV[1])
redis.call('ZREM', KEYS[4], ARGV[1])
redis.call('HDEL', KEYS[6], key)
if redis.call('HGET', KEYS[5], ARGV[2]) == ARGV[1] then
  redis.call('HDEL', KEYS[5], ARGV[2])
  local fallback = nil
  for _, other in ipairs(redis.call('ZREVRANGE', KEYS[3], 0, -1)) do
    local f = redis.call('HMGET', ARGV[5] .. other, 'name', 'host', 'lifecycle')
    if f[1] == ARGV[3] and f[2] == ARGV[4] then
      if f[3] ~= 'retired' then
        fallback = other
        break
      end
      if not fallback then fallback = other end
    end
  end
  if fallback then redis.call('HSET', KEYS[5], ARGV[2], fallback) end
end
return 1
`;

/* ── Decoding ── */

const emptyAsNull = <T extends z.ZodTypeAny>(schema: T) =>
  z.union([z.literal(""), schema]).default("").transform((v) => (v === "" ? null : v));

const jsonString = z.string().transform((s, ctx) => {
  try {
    return JSON.parse(s);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid JSON" });
    return z.NEVER;
  }
});

const labelsSchema = z.record(z.string());

const jobHash = z.object({
  id: z.coerce.number().int().positive(),
  name: z.string(),
  host: z.string(),
  api_key: z.string(),
  automatic_failure_threshold: z.coerce.number().int().positive(),
  labels: jsonString.pipe(labelsSchema),
  lifecycle: z.enum(LIFECYCLES),
  last_reported_at: emptyAsNull(z.string()),
  last_status: emptyAsNull(z.enum(RESULT_STATUSES)),
  last_duration: emptyAsNull(z.coerce.number()),
  created_at: z.string(),
  updated_at: z.string(),
});

const storedResult = z.object({
  job_id: z.number().int(),
  status: z.enum(RESULT_STATUSES),
  duration: z.number(),
  timestamp: z.string(),
  labels: labelsSchema,
  output: z.string().nullable(),
  received_at: z.string(),
});

const appendReply = z.tuple([z.coerce.number().int().positive(), z.string()]);
const scriptStatus = z.coerce.number().int();

export function decodeJob(data: unknown): Job | null {
  const raw = z.record(z.string()).parse(data);
  if (!raw.id) return null;
  const parsed = jobHash.safeParse(raw);
  if (!parsed.success) throw new Error(`corrupt job record ${raw.id}: ${parsed.error.issues[0]?.message}`);
  return parsed.data;
}

export function decodeResult(member: string): JobResult {
  const sep = member.indexOf(":");
  const id = Number(member.slice(0, sep));
  const body = storedResult.parse(JSON.parse(member.slice(sep + 1)));
  return { id, ...body };
}

/**
 * Job store backed by Redis hashes, sorted sets for ordering, and Lua scripts
 * where a write must check and update in one step.
 */
export class RedisJobStore implements JobStore {
  private readonly K: ReturnType<typeof keys>;
  private readonly clock: () => Date;

  constructor(
    private readonly r: Redis,
    opts: { keyPrefix?: string; clock?: () => Date } = {},
  ) {
    this.K = keys(opts.keyPrefix ?? "");
    this.clock = opts.clock ?? (() => new Date());
  }

  async get(name: string, host: string): Promise<Job | null> {
    return this.call("get", async () => {
      const id = await this.r.hget(this.K.identityIdx(), identityKey(name, host));
      return id ? decodeJob(await this.r.hgetall(this.K.job(id))) : null;
    });
  }

  async getById(id: number): Promise<Job | null> {
    return this.call("getById", async () => decodeJob(await this.r.hgetall(this.K.job(id))));
  }

  async getByApiKey(apiKey: string): Promise<Job | null> {
    return this.call("getByApiKey", async () => {
      const id = await this.r.hget(this.K.apiKeyIdx(), apiKey);
      return id ? decodeJob(await this.r.hgetall(this.K.job(id))) : null;
    });
  }

  async *listActive(opts: ListActiveOptions = {}): AsyncIterable<Job[]> {
    const batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE;
    let after = 0;

    for (;;) {
      opts.signal?.throwIfAborted();
      const ids = await this.call("listActive", () =>
        this.r.zrangebyscore(this.K.activeIdx(), `(${after}`, "+inf", "LIMIT", 0, batchSize),
      );
      if (ids.length === 0) return;

      yield await this.hydrate("listActive", ids);

      if (ids.length < batchSize) return;
      after = Number(ids[ids.length - 1]);
    }
  }

  async listJobs(filter: JobFilter = {}): Promise<Job[]> {
    const ids = await this.call("listJobs", () => this.r.zrange(this.K.jobsIdx(), 0, -1));
    const jobs = await this.hydrate("listJobs", ids);
    return jobs
      .filter((j) => !filter.lifecycle || j.lifecycle === filter.lifecycle)
      .filter((j) => !filter.labels || matchesLabels(j.labels, filter.labels));
  }

  async createJob(input: NewJob): Promise<Job> {
    const reply = await this.call("createJob", () =>
      this.r.eval(
        CREATE_JOB,
        5,
        this.K.jobSeq(),
        this.K.jobsIdx(),
        this.K.activeIdx(),
        this.K.identityIdx(),
        this.K.apiKeyIdx(),
        identityKey(input.name, input.host),
        input.api_key,
        input.name,
        input.host,
        input.automatic_failure_threshold,
        JSON.stringify(input.labels),
        input.lifecycle,
        this.clock().toISOString(),
        this.K.jobPrefix(),
      ),
    );

    const id = this.parseReply("createJob", () => scriptStatus.parse(reply));
    if (id === -1) throw new ConflictError(`job already exists: ${input.name}@${input.host}`);
    if (id === -2) throw new ConflictError("API key already in use");
    const job = await this.getById(id);
    if (!job) throw new StoreUnavailableError("createJob", new Error(`job ${id} vanished after insert`));
    return job;
  }

  // Identity and API key checks run in the same script as the write. The
  // script refuses when name, host or key changed since the read below.
  async updateJob(id: number, patch: JobPatch): Promise<Job | null> {
    const existing = await this.getById(id);
    if (!existing) return null;

    const next = { ...existing, ...patch };
    const reply = await this.call("updateJob", () =>
      this.r.eval(
        UPDATE_JOB,
        4,
        this.K.job(id),
        this.K.activeIdx(),
        this.K.identityIdx(),
        this.K.apiKeyIdx(),
        String(id),
        existing.name,
        existing.host,
        existing.api_key,
        identityKey(existing.name, existing.host),
        identityKey(next.name, next.host),
        next.name,
        next.host,
        next.api_key,
        next.automatic_failure_threshold,
        JSON.stringify(next.labels),
        next.lifecycle,
        this.clock().toISOString(),
        this.K.jobPrefix(),
      ),
    );

    switch (this.parseReply("updateJob", () => scriptStatus.parse(reply))) {
      case 0:
        return null;
      case -1:
        throw new ConflictError(`job already exists: ${next.name}@${next.host}`);
      case -2:
        throw new ConflictError("API key already in use");
      case -3:
        throw new ConflictError(`job ${id} was modified concurrently; retry the update`);
    }
    return this.getById(id);
  }

  async deleteJob(id: number): Promise<boolean> {
    const existing = await this.getById(id);
    if (!existing) return false;

    const reply = await this.call("deleteJob", () =>
      this.r.eval(
        DELETE_JOB,
        6,
        this.K.job(id),
        this.K.results(id),
        this.K.jobsIdx(),
        this.K.activeIdx(),
        this.K.identityIdx(),
        this.K.apiKeyIdx(),
        String(id),
        identityKey(existing.name, existing.host),
        existing.name,
        existing.host,
        this.K.jobPrefix(),
      ),
    );
    return this.parseReply("deleteJob", () => scriptStatus.parse(reply)) === 1;
  }

  async appendResult(jobId: number, input: NewJobResult): Promise<AppendOutcome> {
    const ms = Date.parse(input.timestamp);
    const body = JSON.stringify({ job_id: jobId, ...input });

    const reply = await this.call("appendResult", () =>
      this.r.eval(
        APPEND_RESULT,
        3,
        this.K.job(jobId),
        this.K.results(jobId),
        this.K.resultSeq(),
        ms,
        input.timestamp,
        input.status,
        input.duration,
        body,
      ),
    );
    if (reply === null) throw new NotFoundError(`job not found with ID: ${jobId}`);

    const [id, lastReportedAt] = this.parseReply("appendResult", () => appendReply.parse(reply));
    return { result: { ...input, id, job_id: jobId }, lastReportedAt };
  }

  async latestResult(jobId: number): Promise<JobResult | null> {
    const [latest] = await this.listResults(jobId, 1);
    return latest ?? null;
  }

  async listResults(jobId: number, limit: number): Promise<JobResult[]> {
    return this.call("listResults", async () => {
      const members = await this.r.zrevrange(this.K.results(jobId), 0, limit - 1);
      return members.map(decodeResult);
    });
  }

  async ping(): Promise<void> {
    await this.call("ping", () => this.r.ping());
  }

  async close(): Promise<void> {
    await this.r.quit();
  }

  private async hydrate(op: string, ids: string[]): Promise<Job[]> {
    if (ids.length === 0) return [];
    return this.call(op, async () => {
      const pipe = this.r.pipeline();
      for (const id of ids) pipe.hgetall(this.K.job(id));
      const replies = (await pipe.exec()) ?? [];

      const jobs: Job[] = [];
      for (const [err, data] of replies) {
        if (err) throw err;
        const job = decodeJob(data);
        if (job) jobs.push(job);
      }
      return jobs;
    });
  }

  private async call<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isServiceError(err)) throw err;
      throw new StoreUnavailableError(op, err);
    }
  }

  private parseReply<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreUnavailableError(op, err);
    }
  }
}
