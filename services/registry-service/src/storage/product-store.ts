import type Database from "better-sqlite3";
import type { Product } from "@custody/shared";
import { fail, succeed, type OperationResult } from "../errors.js";

export interface ProductStore {
  exists(id: string): boolean;
  get(id: string): Product | null;
  insert(id: string, product: Product): OperationResult<Product>;
  update(id: string, status: string, newOwner: string): OperationResult<Product>;
  count(): number;
}

interface ProductRow {
  id: string;
  current_owner: string;
  registration_timestamp: string;
  is_genuine: number;
  status: string;
  details_uri: string;
}

function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    currentOwner: row.current_owner,
    registrationTimestamp: row.registration_timestamp,
    isGenuine: row.is_genuine === 1,
    status: row.status,
    detailsUri: row.details_uri,
  };
}

/**
 * Current snapshot per product. One row per id, no history: every prior
 * state lives only in the audit log.
 */
export class SqliteProductStore implements ProductStore {
  private readonly insertStmt: Database.Statement<[string, string, string, number, string, string]>;
  private readonly updateStmt: Database.Statement<[string, string, string]>;
  private readonly getStmt: Database.Statement<[string], ProductRow>;
  private readonly existsStmt: Database.Statement<[string], { found: number }>;
  private readonly countStmt: Database.Statement<[], { total: number }>;

  constructor(db: Database.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS products (
        id TEXT PRIMARY KEY,
        current_owner TEXT NOT NULL,
        registration_timestamp TEXT NOT NULL,
        is_genuine INTEGER NOT NULL,
        status TEXT NOT NULL,
        details_uri TEXT NOT NULL
      );
    `);

    this.insertStmt = db.prepare<[string, string, string, number, string, string]>(`
      INSERT INTO products (id, current_owner, registration_timestamp, is_genuine, status, details_uri)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO NOTHING
    `);

    this.updateStmt = db.prepare<[string, string, string]>(`
      UPDATE products
      SET status = ?,
          current_owner = ?
      WHERE id = ?
    `);

    this.getStmt = db.prepare<[string], ProductRow>(`
      SELECT id, current_owner, registration_timestamp, is_genuine, status, details_uri
      FROM products
      WHERE id = ?
      LIMIT 1
    `);

    this.existsStmt = db.prepare<[string], { found: number }>(`
      SELECT 1 AS found
      FROM products
      WHERE id = ?
      LIMIT 1
    `);

    this.countStmt = db.prepare<[], { total: number }>(`
      SELECT COUNT(*) AS total
      FROM products
    `);
  }

  exists(id: string): boolean {
    return this.existsStmt.get(id) !== undefined;
  }

  get(id: string): Product | null {
    const row = this.getStmt.get(id);
    if (!row) return null;
    return toProduct(row);
  }

  insert(id: string, product: Product): OperationResult<Product> {
    const result = this.insertStmt.run(
      id,
      product.currentOwner,
      product.registrationTimestamp,
      product.isGenuine ? 1 : 0,
      product.status,
      product.detailsUri,
    );
    if (result.changes === 0) {
      return fail("DuplicateId", `Product '${id}' is already registered`);
    }
    return succeed({ ...product, id });
  }

  update(id: string, status: string, newOwner: string): OperationResult<Product> {
    const result = this.updateStmt.run(status, newOwner, id);
    const row = result.changes === 0 ? undefined : this.getStmt.get(id);
    if (!row) {
      return fail("NotFound", `Product '${id}' is not registered`);
    }
    return succeed(toProduct(row));
  }

  count(): number {
    return this.countStmt.get()?.total ?? 0;
  }
}
