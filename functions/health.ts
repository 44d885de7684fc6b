import { json, type Context, type RouteConfig } from "../src/lib/http.js";
import { errorMessage } from "../src/lib/errors.js";

const VERSION = "0.3.0";

/**
 * GET /health
 * Liveness plus a store ping. 503 when the store does not answer.
 */
export default async (_req: Request, ctx: Context) => {
  const timestamp = ctx.now().toISOString();
  try {
    await ctx.store.ping();
    return json({ status: "healthy", store: "ok", timestamp, version: VERSION });
  } catch (error) {
    ctx.log.warn("health check failed", { error: errorMessage(error) });
    return json({ status: "unhealthy", store: "unavailable", timestamp, version: VERSION }, 503);
  }
};

export const config: RouteConfig = {
  path: "/health",
  method: ["GET"],
};
