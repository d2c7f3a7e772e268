import type { AuditRecord, IntegrityReport } from "./events.js";
import type { Product, ProductVerification } from "./product.js";

export type RegistryErrorCode =
  | "Unauthorized"
  | "EmptyId"
  | "DuplicateId"
  | "NotFound"
  | "InvalidOwner"
  | "EmptyStatus";

export type EventPublishStatus = "PUBLISHED" | "SKIPPED" | "FAILED";

export interface RegisterProductRequest {
  id: string;
  detailsUri: string;
}

export interface RegisterProductResponse {
  product: Product;
  event: AuditRecord;
  eventPublishStatus: EventPublishStatus;
}

export interface TransferCustodyRequest {
  id: string;
  newStatus: string;
  newOwnerId: string;
}

export interface TransferCustodyResponse {
  product: Product;
  event: AuditRecord;
  eventPublishStatus: EventPublishStatus;
}

export interface VerifyProductResponse extends ProductVerification {
  id: string;
}

export interface GetProductEventsResponse {
  id: string;
  events: AuditRecord[];
}

export interface ListEventsResponse {
  events: AuditRecord[];
}

export type GetIntegrityResponse = IntegrityReport;

export interface IngestAuditEventRequest {
  record: AuditRecord;
}

export interface ErrorResponse {
  error: string;
  message?: string;
}
