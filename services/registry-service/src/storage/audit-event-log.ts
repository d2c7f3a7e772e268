import type Database from "better-sqlite3";
import {
  computeEventHash,
  type AuditEvent,
  type AuditLogHead,
  type AuditRecord,
  type IntegrityReport,
} from "@custody/shared";

export interface AuditEventLog {
  append(event: AuditEvent): AuditRecord;
  forProduct(id: string): AuditRecord[];
  forOwner(identity: string): AuditRecord[];
  since(afterSequence: number, limit: number): AuditRecord[];
  head(): AuditLogHead | null;
  count(): number;
  verifyIntegrity(): IntegrityReport;
}

interface EventRow {
  sequence: number;
  previous_hash: string;
  event_hash: string;
  event_json: string;
}

interface HeadRow {
  sequence: number;
  event_hash: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isAuditEvent(value: unknown): value is AuditEvent {
  if (!isObject(value)) return false;
  if (!isString(value.id) || !isString(value.timestamp)) return false;

  if (value.type === "ProductRegistered") {
    return isString(value.authorityId) && isString(value.detailsUri);
  }
  if (value.type === "StatusUpdated") {
    return (
      isString(value.oldOwner) &&
      isString(value.newOwner) &&
      isString(value.newStatus)
    );
  }
  return false;
}

function toRecord(row: EventRow): AuditRecord {
  const event: unknown = JSON.parse(row.event_json);
  if (!isAuditEvent(event)) {
    throw new Error(`Audit record ${row.sequence} holds a malformed event`);
  }
  return {
    sequence: row.sequence,
    previousHash: row.previous_hash,
    eventHash: row.event_hash,
    event,
  };
}

// Fixed field order so the stored JSON matches the published event schema.
function orderedEvent(event: AuditEvent): AuditEvent {
  if (event.type === "ProductRegistered") {
    return {
      type: event.type,
      id: event.id,
      authorityId: event.authorityId,
      timestamp: event.timestamp,
      detailsUri: event.detailsUri,
    };
  }
  return {
    type: event.type,
    id: event.id,
    oldOwner: event.oldOwner,
    newOwner: event.newOwner,
    newStatus: event.newStatus,
    timestamp: event.timestamp,
  };
}

/**
 * Append-only, hash-chained event log. Sequence numbers are assigned here,
 * inside the caller's write transaction, so they follow commit order with
 * no gaps.
 */
export class SqliteAuditEventLog implements AuditEventLog {
  private readonly db: Database.Database;
  private readonly insertStmt: Database.Statement<
    [number, string, string, string | null, string | null, string, string, string]
  >;
  private readonly headStmt: Database.Statement<[], HeadRow>;
  private readonly byProductStmt: Database.Statement<[string], EventRow>;
  private readonly byOwnerStmt: Database.Statement<[string, string], EventRow>;
  private readonly sinceStmt: Database.Statement<[number, number], EventRow>;
  private readonly allStmt: Database.Statement<[], EventRow>;
  private readonly countStmt: Database.Statement<[], { total: number }>;

  constructor(db: Database.Database) {
    this.db = db;
    db.exec(`
      CREATE TABLE IF NOT EXISTS audit_events (
        sequence INTEGER PRIMARY KEY,
        product_id TEXT NOT NULL,
        event_type TEXT NOT NULL,
        old_owner TEXT,
        new_owner TEXT,
        previous_hash TEXT NOT NULL,
        event_hash TEXT NOT NULL UNIQUE,
        event_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_audit_events_product
      ON audit_events(product_id, sequence ASC);

      CREATE INDEX IF NOT EXISTS idx_audit_events_old_owner
      ON audit_events(old_owner, sequence ASC);

      CREATE INDEX IF NOT EXISTS idx_audit_events_new_owner
      ON audit_events(new_owner, sequence ASC);
    `);

    this.insertStmt = db.prepare<
      [number, string, string, string | null, string | null, string, string, string]
    >(`
      INSERT INTO audit_events (sequence, product_id, event_type, old_owner, new_owner, previous_hash, event_hash, event_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.headStmt = db.prepare<[], HeadRow>(`
      SELECT sequence, event_hash
      FROM audit_events
      ORDER BY sequence DESC
      LIMIT 1
    `);

    this.byProductStmt = db.prepare<[string], EventRow>(`
      SELECT sequence, previous_hash, event_hash, event_json
      FROM audit_events
      WHERE product_id = ?
      ORDER BY sequence ASC
    `);

    this.byOwnerStmt = db.prepare<[string, string], EventRow>(`
      SELECT sequence, previous_hash, event_hash, event_json
      FROM audit_events
      WHERE old_owner = ? OR new_owner = ?
      ORDER BY sequence ASC
    `);

    this.sinceStmt = db.prepare<[number, number], EventRow>(`
      SELECT sequence, previous_hash, event_hash, event_json
      FROM audit_events
      WHERE sequence > ?
      ORDER BY sequence ASC
      LIMIT ?
    `);

    this.allStmt = db.prepare<[], EventRow>(`
      SELECT sequence, previous_hash, event_hash, event_json
      FROM audit_events
      ORDER BY sequence ASC
    `);

    this.countStmt = db.prepare<[], { total: number }>(`
      SELECT COUNT(*) AS total
      FROM audit_events
    `);
  }

  append(event: AuditEvent): AuditRecord {
    if (!this.db.inTransaction) {
      throw new Error("Audit events can only be appended inside a ledger transaction");
    }

    const head = this.head();
    const sequence = (head?.sequence ?? 0) + 1;
    const previousHash = head?.eventHash ?? "";
    const ordered = orderedEvent(event);
    const eventHash = computeEventHash(sequence, previousHash, ordered);

    // Registrations hand custody to the authority, so it is indexed as the new owner.
    const oldOwner = ordered.type === "StatusUpdated" ? ordered.oldOwner : null;
    const newOwner = ordered.type === "StatusUpdated" ? ordered.newOwner : ordered.authorityId;

    this.insertStmt.run(
      sequence,
      ordered.id,
      ordered.type,
      oldOwner,
      newOwner,
      previousHash,
      eventHash,
      JSON.stringify(ordered),
    );

    return { sequence, previousHash, eventHash, event: ordered };
  }

  forProduct(id: string): AuditRecord[] {
    return this.byProductStmt.all(id).map(toRecord);
  }

  forOwner(identity: string): AuditRecord[] {
    return this.byOwnerStmt.all(identity, identity).map(toRecord);
  }

  since(afterSequence: number, limit: number): AuditRecord[] {
    return this.sinceStmt.all(afterSequence, limit).map(toRecord);
  }

  head(): AuditLogHead | null {
    const row = this.headStmt.get();
    if (!row) return null;
    return { sequence: row.sequence, eventHash: row.event_hash };
  }

  count(): number {
    return this.countStmt.get()?.total ?? 0;
  }

  verifyIntegrity(): IntegrityReport {
    let checked = 0;
    let previousHash = "";

    for (const row of this.allStmt.iterate()) {
      const expectedSequence = checked + 1;
      let record: AuditRecord;
      try {
        record = toRecord(row);
      } catch {
        // Unparseable or malformed event_json is tampering like any other.
        return {
          valid: false,
          checked,
          headHash: previousHash,
          brokenAtSequence: row.sequence,
        };
      }
      const recomputed = computeEventHash(record.sequence, record.previousHash, record.event);
      if (
        record.sequence !== expectedSequence ||
        record.previousHash !== previousHash ||
        recomputed !== record.eventHash
      ) {
        return {
          valid: false,
          checked,
          headHash: previousHash,
          brokenAtSequence: record.sequence,
        };
      }
      checked += 1;
      previousHash = record.eventHash;
    }

    return { valid: true, checked, headHash: previousHash };
  }
}
