import type { FastifyBaseLogger } from "fastify";
import {
  buildServiceAuthHeaders,
  type AuditRecord,
  type EventPublishStatus,
  type IngestAuditEventRequest,
} from "@custody/shared";

const PUBLISH_TIMEOUT_MS = 3000;

/**
 * Forwards a committed audit record to an external indexer. Runs after the
 * ledger commit, so a failure here never rolls anything back.
 */
export async function tryPublishAuditRecord(
  eventSinkUrl: string | undefined,
  record: AuditRecord,
  serviceAuthToken: string | undefined,
  log: FastifyBaseLogger,
): Promise<EventPublishStatus> {
  if (!eventSinkUrl) return "SKIPPED";

  const body: IngestAuditEventRequest = { record };
  try {
    const response = await fetch(`${eventSinkUrl.replace(/\/$/, "")}/ingest/audit-event`, {
      method: "POST",
      headers: { ...buildServiceAuthHeaders(serviceAuthToken), "content-type": "application/json" },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(PUBLISH_TIMEOUT_MS),
    });
    if (!response.ok) {
      log.warn(
        { sequence: record.sequence, statusCode: response.status },
        "event sink rejected audit record",
      );
      return "FAILED";
    }
    return "PUBLISHED";
  } catch (error) {
    log.warn(
      { sequence: record.sequence, err: error },
      "event sink unreachable",
    );
    return "FAILED";
  }
}
