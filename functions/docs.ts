import type { Context, RouteConfig } from "../src/lib/http.js";

const jobResultResponses = {
  "201": { description: "Result recorded", content: { "application/json": { schema: { type: "object" } } } },
  "400": { description: "Malformed payload", content: { "application/json": { schema: { $ref: "#/components/schemas/Error" } } } },
  "401": { description: "Missing or unknown API key" },
  "403": { description: "API key belongs to another job" },
  "404": { description: "Job not found" },
  "409": { description: "Job is retired" },
  "503": { description: "Job store unavailable" },
};

export function openApiSpec(metricsPath: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Cron Metrics Exporter",
      version: "0.3.0",
      description:
        "Collects cron job results and exposes per-job health as Prometheus metrics. " +
        "Job routes need an admin key as `Authorization: Bearer <key>`; result submissions use the job's own key in `X-API-Key`.",
    },
    paths: {
      "/api/job-result": {
        post: {
          summary: "Submit a job result",
          security: [{ jobKey: [] }],
          requestBody: {
            required: true,
            content: { "application/json": { schema: { $ref: "#/components/schemas/JobResultInput" } } },
          },
          responses: jobResultResponses,
        },
      },
      [metricsPath]: {
        get: {
          summary: "Prometheus metrics",
          responses: {
            "200": { description: "Text exposition format", content: { "text/plain": { schema: { type: "string" } } } },
            "503": { description: "Job store unavailable" },
          },
        },
      },
      "/api/status": {
        get: {
          summary: "Derived status of every job",
          parameters: [
            {
              name: "status",
              in: "query",
              schema: { type: "string", enum: ["success", "failure", "missed_deadline", "maintenance"] },
            },
          ],
          responses: { "200": { description: "Status list" } },
        },
      },
      "/api/job": {
        get: {
          summary: "List jobs",
          security: [{ adminKey: [] }],
          parameters: [
            { name: "lifecycle", in: "query", schema: { $ref: "#/components/schemas/Lifecycle" } },
            {
              name: "label.<key>",
              in: "query",
              schema: { type: "string" },
              description: "Only jobs whose label <key> equals the value",
            },
          ],
          responses: {
            "200": { description: "Jobs", content: { "application/json": { schema: { $ref: "#/components/schemas/JobList" } } } },
          },
        },
        post: {
          summary: "Register a job",
          security: [{ adminKey: [] }],
          requestBody: {
            required: true,
            content: { "application/json": { schema: { $ref: "#/components/schemas/JobInput" } } },
          },
          responses: {
            "201": { description: "Job created (full API key included)", content: { "application/json": { schema: { $ref: "#/components/schemas/Job" } } } },
            "400": { description: "Invalid payload" },
            "409": { description: "Job or API key already exists" },
          },
        },
      },
      "/api/job/{id}": {
        parameters: [{ name: "id", in: "path", required: true, schema: { type: "integer" } }],
        get: {
          summary: "Get a job with its latest result",
          security: [{ adminKey: [] }],
          responses: { "200": { description: "Job" }, "404": { description: "Job not found" } },
        },
        put: {
          summary: "Update a job",
          security: [{ adminKey: [] }],
          requestBody: {
            required: true,
            content: { "application/json": { schema: { $ref: "#/components/schemas/JobInput" } } },
          },
          responses: {
            "200": { description: "Updated job" },
            "404": { description: "Job not found" },
            "409": { description: "Identity or API key taken" },
          },
        },
        delete: {
          summary: "Delete a job and its results",
          security: [{ adminKey: [] }],
          responses: { "204": { description: "Deleted" }, "404": { description: "Job not found" } },
        },
      },
      "/api/job/{id}/results": {
        get: {
          summary: "Recent results of a job",
          security: [{ adminKey: [] }],
          parameters: [
            { name: "id", in: "path", required: true, schema: { type: "integer" } },
            { name: "limit", in: "query", schema: { type: "integer", minimum: 1, maximum: 100, default: 20 } },
          ],
          responses: { "200": { description: "Results" }, "404": { description: "Job not found" } },
        },
      },
      "/health": {
        get: {
          summary: "Health check",
          responses: { "200": { description: "Healthy" }, "503": { description: "Store unavailable" } },
        },
      },
    },
    components: {
      securitySchemes: {
        adminKey: { type: "http", scheme: "bearer" },
        jobKey: { type: "apiKey", in: "header", name: "X-API-Key" },
      },
      schemas: {
        Lifecycle: { type: "string", enum: ["active", "maintenance", "paused", "retired"] },
        Labels: { type: "object", additionalProperties: { type: "string" } },
        Error: {
          type: "object",
          properties: { error: { type: "string" }, code: { type: "string" } },
        },
        JobResultInput: {
          type: "object",
          required: ["job_name", "host", "status"],
          properties: {
            job_name: { type: "string" },
            host: { type: "string" },
            status: { type: "string", enum: ["success", "failure"] },
            labels: { $ref: "#/components/schemas/Labels" },
            duration: { type: "number", minimum: 0, description: "Seconds" },
            timestamp: { type: "string", format: "date-time", description: "Defaults to receipt time" },
            output: { type: "string" },
          },
        },
        JobInput: {
          type: "object",
          required: ["job_name", "host"],
          properties: {
            job_name: { type: "string" },
            host: { type: "string" },
            automatic_failure_threshold: { type: "integer", minimum: 1, default: 3600 },
            labels: { $ref: "#/components/schemas/Labels" },
            lifecycle: { $ref: "#/components/schemas/Lifecycle" },
            api_key: { type: "string", description: "Generated when omitted" },
          },
        },
        Job: {
          type: "object",
          properties: {
            id: { type: "integer" },
            job_name: { type: "string" },
            host: { type: "string" },
            api_key: { type: "string" },
            automatic_failure_threshold: { type: "integer" },
            labels: { $ref: "#/components/schemas/Labels" },
            lifecycle: { $ref: "#/components/schemas/Lifecycle" },
            last_reported_at: { type: "string", format: "date-time", nullable: true },
            last_status: { type: "string", enum: ["success", "failure"], nullable: true },
            last_duration: { type: "number", nullable: true },
            created_at: { type: "string", format: "date-time" },
            updated_at: { type: "string", format: "date-time" },
          },
        },
        JobList: {
          type: "object",
          properties: {
            count: { type: "integer" },
            jobs: { type: "array", items: { $ref: "#/components/schemas/Job" } },
          },
        },
      },
    },
  };
}

function swaggerHtml(spec: unknown): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Cron Metrics Exporter - API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui.css" />
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui-bundle.js"></script>
  <script>
    SwaggerUIBundle({
      spec: ${JSON.stringify(spec).replace(/</g, "\\u003c")},
      dom_id: '#swagger-ui',
      deepLinking: true,
      docExpansion: "list",
      presets: [SwaggerUIBundle.presets.apis, SwaggerUIBundle.SwaggerUIStandalonePreset],
      layout: "BaseLayout",
    });
  </script>
</body>
</html>`;
}

export default async (req: Request, ctx: Context) => {
  const url = new URL(req.url);
  const spec = openApiSpec(ctx.config.metrics.path);

  // Return raw OpenAPI JSON
  if (url.searchParams.get("format") === "json") {
    return new Response(JSON.stringify(spec, null, 2), {
      headers: { "Content-Type": "application/json" },
    });
  }

  return new Response(swaggerHtml(spec), {
    headers: { "Content-Type": "text/html; charset=utf-8" },
  });
};

export const config: RouteConfig = {
  path: "/api/docs",
  method: ["GET"],
};
