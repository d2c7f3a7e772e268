export interface ProductRegisteredEvent {
  type: "ProductRegistered";
  id: string;
  authorityId: string;
  timestamp: string;    // ISO date
  detailsUri: string;
}

export interface StatusUpdatedEvent {
  type: "StatusUpdated";
  id: string;
  oldOwner: string;
  newOwner: string;
  newStatus: string;
  timestamp: string;    // ISO date
}

export type AuditEvent = ProductRegisteredEvent | StatusUpdatedEvent;

export interface AuditRecord {
  sequence: number;     // global commit order, starts at 1
  previousHash: string; // "" for the first record
  eventHash: string;    // sha256Hex(canonicalJson({ sequence, previousHash, event }))
  event: AuditEvent;
}

export interface AuditLogHead {
  sequence: number;
  eventHash: string;
}

export interface IntegrityReport {
  valid: boolean;
  checked: number;
  headHash: string;
  brokenAtSequence?: number;
}
