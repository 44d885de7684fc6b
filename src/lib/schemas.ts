import { z } from "zod";
import { InvalidInputError } from "./errors.js";
import { isValidLabelName } from "./labels.js";
import { LIFECYCLES, RESULT_STATUSES } from "./types.js";

const labels = z.record(z.string()).refine((l) => Object.keys(l).every(isValidLabelName), {
  message: "label names must match [a-zA-Z_][a-zA-Z0-9_]* and not start with __",
});

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((v) => new Date(v).toISOString());

export const jobResultPayload = z.object({
  job_name: z.string().min(1),
  host: z.string().min(1),
  status: z.enum(RESULT_STATUSES),
  labels: z.record(z.string()).optional(),
  duration: z.number().finite().nonnegative().optional(),
  timestamp: timestamp.optional(),
  output: z.string().optional(),
});
export type JobResultPayload = z.infer<typeof jobResultPayload>;

export const createJobPayload = z.object({
  job_name: z.string().min(1),
  host: z.string().min(1),
  api_key: z.string().min(1).optional(),
  automatic_failure_threshold: z.number().int().min(1).optional(),
  labels: labels.optional(),
  lifecycle: z.enum(LIFECYCLES).optional(),
});
export type CreateJobPayload = z.infer<typeof createJobPayload>;

export const updateJobPayload = createJobPayload.partial();
export type UpdateJobPayload = z.infer<typeof updateJobPayload>;

/** Parses a payload or throws InvalidInputError naming the first bad field. */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".");
    throw new InvalidInputError(field ? `${field}: ${issue?.message}` : (issue?.message ?? "invalid payload"));
  }
  return parsed.data;
}

export async function readJson(req: Request): Promise<unknown> {
  const text = await req.text();
  if (text.trim() === "") throw new InvalidInputError("request body is required");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new InvalidInputError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}
