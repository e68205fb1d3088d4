// backend/services/docs/src/openapi.ts

/**
 * Hand-maintained OpenAPI 3.0 description of the docs service, plus two HTML
 * shells (Swagger UI, ReDoc) that render it in a browser.
 */

import { DEFAULT_LLM_MODEL, LLM_MODELS } from "./config";
import { DOC_STATUSES, NODE_STATUSES } from "./contracts/docs";

const json = (schema: object) => ({
  content: { "application/json": { schema } },
});

const problem = (description: string) => ({
  description,
  content: {
    "application/problem+json": {
      schema: { $ref: "#/components/schemas/Problem" },
    },
  },
});

const idParam = {
  name: "id",
  in: "path",
  required: true,
  schema: { type: "string" },
};

const modelParam = {
  name: "model",
  in: "query",
  required: false,
  schema: { type: "string", enum: [...LLM_MODELS], default: DEFAULT_LLM_MODEL },
};

const bearer = [{ bearerAuth: [] }];

export function buildOpenApiDocument(serviceName: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "repodocs",
      version: "1.0.0",
      description: `Documentation generation for GitHub code (service: ${serviceName}).`,
    },
    components: {
      securitySchemes: {
        bearerAuth: { type: "http", scheme: "bearer", bearerFormat: "JWT" },
      },
      schemas: {
        Problem: {
          type: "object",
          required: ["type", "title", "status"],
          properties: {
            type: { type: "string" },
            title: { type: "string" },
            status: { type: "integer" },
            detail: { type: "string" },
            instance: { type: "string" },
            code: { type: "string" },
            errors: {
              type: "array",
              items: {
                type: "object",
                properties: {
                  path: { type: "string" },
                  code: { type: "string" },
                  message: { type: "string" },
                },
              },
            },
          },
        },
        Accepted: {
          type: "object",
          required: ["message", "id"],
          properties: { message: { type: "string" }, id: { type: "string" } },
        },
        FileDocs: {
          type: "object",
          required: ["id", "github_url", "status", "content"],
          properties: {
            id: { type: "string" },
            github_url: { type: "string" },
            status: { type: "string", enum: [...DOC_STATUSES] },
            content: { type: "string", nullable: true },
          },
        },
        TreeNode: {
          type: "object",
          properties: {
            id: { type: "string" },
            name: { type: "string" },
            path: { type: "string" },
            type: { type: "string", enum: ["file", "dir"] },
            status: { type: "string", enum: [...NODE_STATUSES] },
            githubUrl: { type: "string" },
            children: {
              type: "array",
              items: { $ref: "#/components/schemas/TreeNode" },
            },
          },
        },
        Repo: {
          type: "object",
          properties: {
            id: { type: "string" },
            name: { type: "string" },
            ownerId: { type: "string" },
            status: { type: "string", enum: [...NODE_STATUSES] },
            tree: {
              type: "array",
              items: { $ref: "#/components/schemas/TreeNode" },
            },
          },
        },
      },
    },
    paths: {
      "/ping": {
        get: {
          summary: "Liveness ping",
          responses: { "200": { description: "pong", ...json({ type: "string" }) } },
        },
      },
      "/hello_world": {
        get: {
          summary: "Greeting",
          responses: {
            "200": {
              description: "Greeting",
              ...json({
                type: "object",
                properties: { message: { type: "string" } },
              }),
            },
          },
        },
      },
      "/docs": {
        post: {
          summary: "Document one GitHub file synchronously",
          requestBody: {
            required: true,
            ...json({
              type: "object",
              required: ["url"],
              properties: { url: { type: "string" } },
            }),
          },
          responses: {
            "200": {
              description: "Generated Markdown",
              ...json({
                type: "object",
                properties: { content: { type: "string" } },
              }),
            },
            "400": problem("Empty or invalid url"),
            "502": problem("GitHub or LLM failure"),
          },
        },
      },
      "/file-docs": {
        post: {
          summary: "Start documenting a GitHub file",
          security: bearer,
          parameters: [modelParam],
          requestBody: {
            required: true,
            ...json({
              type: "object",
              required: ["github_url"],
              properties: { github_url: { type: "string" } },
            }),
          },
          responses: {
            "202": {
              description: "Generation started",
              ...json({ $ref: "#/components/schemas/Accepted" }),
            },
            "401": problem("Missing or invalid token"),
            "422": problem("github_url missing"),
          },
        },
      },
      "/file-docs/{id}": {
        get: {
          summary: "Read one documentation record",
          security: bearer,
          parameters: [idParam],
          responses: {
            "200": {
              description: "Record",
              ...json({ $ref: "#/components/schemas/FileDocs" }),
            },
            "404": problem("Not found"),
          },
        },
        put: {
          summary: "Regenerate a documentation record",
          security: bearer,
          parameters: [idParam, modelParam],
          responses: {
            "202": {
              description: "Regeneration started",
              ...json({ $ref: "#/components/schemas/Accepted" }),
            },
            "400": problem("Generation still running"),
            "404": problem("Not found"),
          },
        },
        delete: {
          summary: "Delete a documentation record",
          security: bearer,
          parameters: [idParam],
          responses: {
            "200": {
              description: "Deleted",
              ...json({ $ref: "#/components/schemas/Accepted" }),
            },
            "400": problem("Generation still running"),
            "404": problem("Not found"),
          },
        },
      },
      "/repos": {
        get: {
          summary: "List the caller's repository ids",
          security: bearer,
          responses: {
            "200": {
              description: "Ids",
              ...json({
                type: "object",
                properties: {
                  repos: { type: "array", items: { type: "string" } },
                },
              }),
            },
          },
        },
        post: {
          summary: "Walk a GitHub repository and store its tree",
          security: bearer,
          requestBody: {
            required: true,
            ...json({
              type: "object",
              required: ["github_url"],
              properties: { github_url: { type: "string" } },
            }),
          },
          responses: {
            "201": {
              description: "Stored repository",
              ...json({
                type: "object",
                properties: { repo: { $ref: "#/components/schemas/Repo" } },
              }),
            },
            "422": problem("github_url missing"),
          },
        },
      },
      "/repos/{id}": {
        get: {
          summary: "Read one repository tree",
          security: bearer,
          parameters: [idParam],
          responses: {
            "200": {
              description: "Repository",
              ...json({
                type: "object",
                properties: { repo: { $ref: "#/components/schemas/Repo" } },
              }),
            },
            "404": problem("Not found"),
          },
        },
      },
    },
  };
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function swaggerUiHtml(specUrl: string, title: string): string {
  const t = escapeHtml(`${title} - Swagger UI`);
  const url = JSON.stringify(specUrl);
  return `<!DOCTYPE html>
<html>
<head>
<title>${t}</title>
<meta charset="utf-8">
<link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/swagger-ui-dist@5/swagger-ui.css">
</head>
<body>
<div id="swagger-ui"></div>
<script src="https://cdn.jsdelivr.net/npm/swagger-ui-dist@5/swagger-ui-bundle.js"></script>
<script>
window.ui = SwaggerUIBundle({ url: ${url}, dom_id: "#swagger-ui" });
</script>
</body>
</html>`;
}

export function redocHtml(specUrl: string, title: string): string {
  const t = escapeHtml(`${title} - ReDoc`);
  return `<!DOCTYPE html>
<html>
<head>
<title>${t}</title>
<meta charset="utf-8">
</head>
<body>
<redoc spec-url="${escapeHtml(specUrl)}"></redoc>
<script src="https://cdn.jsdelivr.net/npm/redoc@2/bundles/redoc.standalone.js"></script>
</body>
</html>`;
}
