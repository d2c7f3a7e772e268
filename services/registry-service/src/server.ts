import Fastify, { type FastifyReply, type FastifyRequest } from "fastify";
import {
  CALLER_ID_HEADER,
  isServiceAuthAuthorized,
  isValidIdentity,
  parseCallerIdHeader,
  SERVICE_AUTH_HEADER,
  type GetIntegrityResponse,
  type GetProductEventsResponse,
  type ListEventsResponse,
  type RegisterProductRequest,
  type RegisterProductResponse,
  type TransferCustodyRequest,
  type TransferCustodyResponse,
  type VerifyProductResponse,
} from "@custody/shared";
import { AccessControlGuard } from "./access/access-control-guard.js";
import { HTTP_ERRORS, type RegistryFailure } from "./errors.js";
import { tryPublishAuditRecord } from "./event-sink.js";
import { buildOpenApiSpec } from "./openapi.js";
import type { Clock } from "./services/clock.js";
import { CustodyTransferService } from "./services/custody-transfer-service.js";
import { RegistrationService } from "./services/registration-service.js";
import { VerificationService } from "./services/verification-service.js";
import { type RegistryLedger, SqliteRegistryLedger } from "./storage/registry-ledger.js";

const DEFAULT_DB_PATH = "data/registry-service.db";
const DEFAULT_EVENT_PAGE_SIZE = 100;
const MAX_EVENT_PAGE_SIZE = 500;

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function parseNonNegativeInt(value: unknown): number | null {
  if (typeof value !== "string" || !/^\d+$/.test(value)) return null;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

// Empty strings pass through: the core reports EmptyId / EmptyStatus / InvalidOwner.
function parseRegisterRequest(body: unknown): RegisterProductRequest | null {
  if (!isObject(body)) return null;
  if (!isString(body.id)) return null;
  if (!isString(body.detailsUri)) return null;
  return { id: body.id, detailsUri: body.detailsUri };
}

function parseTransferRequest(body: unknown): TransferCustodyRequest | null {
  if (!isObject(body)) return null;
  if (!isString(body.id)) return null;
  if (!isString(body.newStatus)) return null;
  if (!isString(body.newOwnerId)) return null;
  return {
    id: body.id,
    newStatus: body.newStatus,
    newOwnerId: body.newOwnerId,
  };
}

interface EventsQuery {
  owner?: string;
  afterSequence: number;
  limit: number;
}

function parseEventsQuery(query: unknown): EventsQuery | null {
  if (!isObject(query)) return null;
  if (query.owner !== undefined && !isNonEmptyString(query.owner)) return null;

  let afterSequence = 0;
  if (query.afterSequence !== undefined) {
    const parsed = parseNonNegativeInt(query.afterSequence);
    if (parsed === null) return null;
    afterSequence = parsed;
  }

  let limit = DEFAULT_EVENT_PAGE_SIZE;
  if (query.limit !== undefined) {
    const parsed = parseNonNegativeInt(query.limit);
    if (parsed === null || parsed < 1 || parsed > MAX_EVENT_PAGE_SIZE) return null;
    limit = parsed;
  }

  return { owner: query.owner, afterSequence, limit };
}

export interface BuildServerOptions {
  ledger?: RegistryLedger;
  dbPath?: string;
  authorityId?: string;
  serviceAuthToken?: string;
  eventSinkUrl?: string;
  serviceBaseUrl?: string;
  logLevel?: string;
  clock?: Clock;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const authorityId = options.authorityId ?? process.env.REGISTRY_AUTHORITY_ID;
  if (!isValidIdentity(authorityId)) {
    throw new Error(
      "REGISTRY_AUTHORITY_ID must be a non-null identity (or pass authorityId in buildServer options)",
    );
  }

  const app = Fastify({
    logger: { level: options.logLevel ?? process.env.LOG_LEVEL ?? "info" },
  });
  const ledger =
    options.ledger ||
    new SqliteRegistryLedger(options.dbPath || process.env.REGISTRY_DB_PATH || DEFAULT_DB_PATH);
  const ownLedger = !options.ledger;
  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;
  const eventSinkUrl = options.eventSinkUrl ?? process.env.EVENT_SINK_URL;
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4110}`;

  const guard = new AccessControlGuard({ authorityId, products: ledger.products });
  const registration = new RegistrationService(guard, ledger, options.clock);
  const custodyTransfer = new CustodyTransferService(guard, ledger, options.clock);
  const verification = new VerificationService(ledger.products);

  function requireServiceAuth(req: FastifyRequest, reply: FastifyReply): boolean {
    if (isServiceAuthAuthorized(req.headers[SERVICE_AUTH_HEADER], serviceAuthToken)) {
      return true;
    }
    void reply.code(401).send({
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    });
    return false;
  }

  function requireCaller(req: FastifyRequest, reply: FastifyReply): string | null {
    const callerId = parseCallerIdHeader(req.headers[CALLER_ID_HEADER]);
    if (callerId) return callerId;
    void reply.code(401).send({
      error: "missing_caller",
      message: `Missing '${CALLER_ID_HEADER}' header`,
    });
    return null;
  }

  function sendFailure(reply: FastifyReply, failure: RegistryFailure) {
    const mapped = HTTP_ERRORS[failure.code];
    return reply.code(mapped.statusCode).send({
      error: mapped.error,
      message: failure.message,
    });
  }

  app.get("/health", async () => ({
    ok: true,
    service: "registry-service",
    authorityId,
    products: ledger.products.count(),
    events: ledger.events.count(),
  }));

  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  app.post("/products/register", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const callerId = requireCaller(req, reply);
    if (!callerId) return;

    const parsed = parseRegisterRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected string fields id and detailsUri",
      });
    }

    const result = registration.register(callerId, parsed.id, parsed.detailsUri);
    if (!result.ok) {
      req.log.warn({ productId: parsed.id, callerId, code: result.code }, "registration rejected");
      return sendFailure(reply, result);
    }

    const { product, record } = result.value;
    req.log.info(
      { productId: product.id, owner: product.currentOwner, sequence: record.sequence },
      "product registered",
    );

    const eventPublishStatus = await tryPublishAuditRecord(
      eventSinkUrl,
      record,
      serviceAuthToken,
      req.log,
    );

    const response: RegisterProductResponse = {
      product,
      event: record,
      eventPublishStatus,
    };
    return reply.code(201).send(response);
  });

  app.post("/products/transfer", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const callerId = requireCaller(req, reply);
    if (!callerId) return;

    const parsed = parseTransferRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected string fields id, newStatus and newOwnerId",
      });
    }

    const result = custodyTransfer.transfer(
      callerId,
      parsed.id,
      parsed.newStatus,
      parsed.newOwnerId,
    );
    if (!result.ok) {
      req.log.warn({ productId: parsed.id, callerId, code: result.code }, "transfer rejected");
      return sendFailure(reply, result);
    }

    const { product, previousOwner, record } = result.value;
    req.log.info(
      {
        productId: product.id,
        from: previousOwner,
        to: product.currentOwner,
        status: product.status,
        sequence: record.sequence,
      },
      "custody transferred",
    );

    const eventPublishStatus = await tryPublishAuditRecord(
      eventSinkUrl,
      record,
      serviceAuthToken,
      req.log,
    );

    const response: TransferCustodyResponse = {
      product,
      event: record,
      eventPublishStatus,
    };
    return response;
  });

  app.get<{ Params: { id: string } }>("/products/:id/verify", async (req, reply) => {
    const result = verification.verify(req.params.id);
    if (!result.ok) {
      return sendFailure(reply, result);
    }
    const response: VerifyProductResponse = { id: req.params.id, ...result.value };
    return response;
  });

  app.get<{ Params: { id: string } }>("/products/:id/events", async (req) => {
    const response: GetProductEventsResponse = {
      id: req.params.id,
      events: ledger.events.forProduct(req.params.id),
    };
    return response;
  });

  app.get("/events", async (req, reply) => {
    const query = parseEventsQuery(req.query);
    if (!query) {
      return reply.code(400).send({
        error: "invalid_query",
        message: `Expected optional owner, afterSequence >= 0 and limit 1-${MAX_EVENT_PAGE_SIZE}`,
      });
    }

    const events = query.owner
      ? ledger.events
          .forOwner(query.owner)
          .filter((record) => record.sequence > query.afterSequence)
          .slice(0, query.limit)
      : ledger.events.since(query.afterSequence, query.limit);

    const response: ListEventsResponse = { events };
    return response;
  });

  app.get("/events/integrity", async () => {
    const response: GetIntegrityResponse = ledger.events.verifyIntegrity();
    return response;
  });

  app.addHook("onClose", async () => {
    if (ownLedger) {
      ledger.close();
    }
  });

  return app;
}
