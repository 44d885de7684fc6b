import type { AppConfig } from "../config/server.js";
import { ForbiddenError, UnauthorizedError } from "./errors.js";
import type { JobStore } from "./job-store.js";

export type Credential = { kind: "admin" } | { kind: "job"; jobId: number; name: string; host: string };

/** X-API-Key first (job submissions), then `Authorization: Bearer` (admin tooling). */
export function extractApiKey(req: Request): string | null {
  const apiKey = req.headers.get("x-api-key");
  if (apiKey) return apiKey;

  const auth = req.headers.get("authorization");
  if (!auth?.startsWith("Bearer ")) return null;
  const token = auth.slice("Bearer ".length).trim();
  return token || null;
}

/**
 * Resolves the caller, or null when no usable key was sent. Dev mode treats
 * every caller as admin.
 */
export async function resolveCredential(
  req: Request,
  store: JobStore,
  config: Pick<AppConfig, "security" | "dev">,
): Promise<Credential | null> {
  if (config.dev) return { kind: "admin" };

  const key = extractApiKey(req);
  if (!key) return null;
  if (config.security.adminApiKeys.includes(key)) return { kind: "admin" };

  const job = await store.getByApiKey(key);
  return job ? { kind: "job", jobId: job.id, name: job.name, host: job.host } : null;
}

export async function requireCredential(
  req: Request,
  store: JobStore,
  config: Pick<AppConfig, "security" | "dev">,
): Promise<Credential> {
  const credential = await resolveCredential(req, store, config);
  if (!credential) throw new UnauthorizedError();
  return credential;
}

export async function requireAdmin(
  req: Request,
  store: JobStore,
  config: Pick<AppConfig, "security" | "dev">,
): Promise<void> {
  const credential = await requireCredential(req, store, config);
  if (credential.kind !== "admin") throw new ForbiddenError("admin access required");
}
