const productIdParam = {
  in: "path",
  name: "id",
  required: true,
  schema: { type: "string" },
};

const callerHeader = {
  in: "header",
  name: "x-caller-id",
  required: true,
  schema: { type: "string" },
};

export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Custody Registry API",
      version: "0.1.0",
      description: "Register products, hand over custody, verify snapshots and read the audit log.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check with product and event counts",
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/products/register": {
        post: {
          summary: "Register a product (authority only)",
          parameters: [callerHeader],
          responses: {
            "201": { description: "Product registered" },
            "400": { description: "Invalid request or empty id" },
            "401": { description: "Missing caller identity or service token" },
            "403": { description: "Caller is not the authority" },
            "409": { description: "Product id already registered" },
          },
        },
      },
      "/products/transfer": {
        post: {
          summary: "Transfer custody and set a new status (current owner only)",
          parameters: [callerHeader],
          responses: {
            "200": { description: "Custody transferred" },
            "400": { description: "Invalid request, owner or status" },
            "401": { description: "Missing caller identity or service token" },
            "403": { description: "Caller does not hold custody" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{id}/verify": {
        get: {
          summary: "Current snapshot of a product",
          parameters: [productIdParam],
          responses: {
            "200": { description: "Product found" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{id}/events": {
        get: {
          summary: "Audit records for one product in commit order",
          parameters: [productIdParam],
          responses: {
            "200": { description: "Records fetched (empty for unknown ids)" },
          },
        },
      },
      "/events": {
        get: {
          summary: "Audit records by owner, or the log tail after a sequence",
          parameters: [
            { in: "query", name: "owner", required: false, schema: { type: "string" } },
            { in: "query", name: "afterSequence", required: false, schema: { type: "integer", minimum: 0 } },
            { in: "query", name: "limit", required: false, schema: { type: "integer", minimum: 1, maximum: 500 } },
          ],
          responses: {
            "200": { description: "Records fetched" },
            "400": { description: "Invalid query" },
          },
        },
      },
      "/events/integrity": {
        get: {
          summary: "Walk the hash chain of the audit log",
          responses: {
            "200": { description: "Integrity report" },
          },
        },
      },
    },
  };
}
