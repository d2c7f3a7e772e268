import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { SqliteAuditEventLog, type AuditEventLog } from "./audit-event-log.js";
import { SqliteProductStore, type ProductStore } from "./product-store.js";

/**
 * Snapshot store and audit log behind one write lock. Everything done inside
 * `atomically` commits together or not at all.
 */
export interface RegistryLedger {
  readonly products: ProductStore;
  readonly events: AuditEventLog;
  atomically<T>(work: () => T): T;
  close(): void;
}

export class SqliteRegistryLedger implements RegistryLedger {
  readonly products: ProductStore;
  readonly events: AuditEventLog;
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.products = new SqliteProductStore(this.db);
    this.events = new SqliteAuditEventLog(this.db);
  }

  atomically<T>(work: () => T): T {
    // BEGIN IMMEDIATE: the write lock is held from the first precondition read.
    return this.db.transaction(work).immediate();
  }

  close(): void {
    this.db.close();
  }
}
