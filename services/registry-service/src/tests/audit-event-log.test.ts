import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import Database from "better-sqlite3";
import { computeEventHash, type AuditEvent } from "@custody/shared";
import { SqliteRegistryLedger } from "../storage/registry-ledger.js";

function createTempLedger() {
  const dir = mkdtempSync(join(tmpdir(), "custody-audit-log-"));
  const dbPath = join(dir, "registry.db");
  return {
    dir,
    dbPath,
    ledger: new SqliteRegistryLedger(dbPath),
  };
}

const registered: AuditEvent = {
  type: "ProductRegistered",
  id: "SN-001",
  authorityId: "maker",
  timestamp: "2026-03-01T08:00:00.000Z",
  detailsUri: "ipfs://x",
};

const shipped: AuditEvent = {
  type: "StatusUpdated",
  id: "SN-001",
  oldOwner: "maker",
  newOwner: "distributor",
  newStatus: "Shipped",
  timestamp: "2026-03-01T09:00:00.000Z",
};

const otherRegistered: AuditEvent = {
  type: "ProductRegistered",
  id: "SN-002",
  authorityId: "maker",
  timestamp: "2026-03-01T10:00:00.000Z",
  detailsUri: "ipfs://y",
};

const delivered: AuditEvent = {
  type: "StatusUpdated",
  id: "SN-001",
  oldOwner: "distributor",
  newOwner: "clinic",
  newStatus: "Delivered",
  timestamp: "2026-03-01T11:00:00.000Z",
};

test("refuses appends outside a ledger transaction", () => {
  const temp = createTempLedger();
  try {
    assert.throws(() => temp.ledger.events.append(registered), /inside a ledger transaction/);
    assert.equal(temp.ledger.events.count(), 0);
  } finally {
    temp.ledger.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("assigns gap-free sequences and chains hashes", () => {
  const temp = createTempLedger();
  try {
    const { events } = temp.ledger;
    assert.equal(events.head(), null);

    const first = temp.ledger.atomically(() => events.append(registered));
    const second = temp.ledger.atomically(() => events.append(shipped));

    assert.equal(first.sequence, 1);
    assert.equal(first.previousHash, "");
    assert.equal(first.eventHash, computeEventHash(1, "", registered));
    assert.equal(second.sequence, 2);
    assert.equal(second.previousHash, first.eventHash);
    assert.equal(second.eventHash, computeEventHash(2, first.eventHash, shipped));
    assert.deepEqual(events.head(), { sequence: 2, eventHash: second.eventHash });
  } finally {
    temp.ledger.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("stores events with the published field order", () => {
  const temp = createTempLedger();
  try {
    const scrambled: AuditEvent = {
      timestamp: "2026-03-01T09:00:00.000Z",
      newStatus: "Shipped",
      newOwner: "distributor",
      oldOwner: "maker",
      id: "SN-001",
      type: "StatusUpdated",
    };
    temp.ledger.atomically(() => temp.ledger.events.append(scrambled));
    const [stored] = temp.ledger.events.forProduct("SN-001");
    assert.deepEqual(Object.keys(stored?.event ?? {}), [
      "type",
      "id",
      "oldOwner",
      "newOwner",
      "newStatus",
      "timestamp",
    ]);
  } finally {
    temp.ledger.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("queries by product, owner and sequence cursor", () => {
  const temp = createTempLedger();
  try {
    const { events } = temp.ledger;
    for (const event of [registered, shipped, otherRegistered, delivered]) {
      temp.ledger.atomically(() => events.append(event));
    }

    assert.deepEqual(
      events.forProduct("SN-001").map((record) => record.sequence),
      [1, 2, 4],
    );
    assert.deepEqual(
      events.forOwner("distributor").map((record) => record.sequence),
      [2, 4],
    );
    assert.deepEqual(
      events.forOwner("maker").map((record) => record.sequence),
      [1, 2, 3],
    );
    assert.deepEqual(
      events.since(1, 2).map((record) => record.sequence),
      [2, 3],
    );
    assert.deepEqual(events.since(4, 10), []);
    assert.deepEqual(events.forProduct("SN-404"), []);
    assert.equal(events.count(), 4);
  } finally {
    temp.ledger.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("integrity check passes on an untouched log", () => {
  const temp = createTempLedger();
  try {
    const { events } = temp.ledger;
    assert.deepEqual(events.verifyIntegrity(), { valid: true, checked: 0, headHash: "" });

    temp.ledger.atomically(() => events.append(registered));
    const last = temp.ledger.atomically(() => events.append(shipped));
    assert.deepEqual(events.verifyIntegrity(), {
      valid: true,
      checked: 2,
      headHash: last.eventHash,
    });
  } finally {
    temp.ledger.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("integrity check reports the first edited record", () => {
  const temp = createTempLedger();
  try {
    const { events } = temp.ledger;
    const first = temp.ledger.atomically(() => events.append(registered));
    temp.ledger.atomically(() => events.append(shipped));
    temp.ledger.atomically(() => events.append(delivered));

    const raw = new Database(temp.dbPath);
    try {
      raw
        .prepare("UPDATE audit_events SET event_json = ? WHERE sequence = 2")
        .run(JSON.stringify({ ...shipped, newOwner: "intruder" }));
    } finally {
      raw.close();
    }

    assert.deepEqual(events.verifyIntegrity(), {
      valid: false,
      checked: 1,
      headHash: first.eventHash,
      brokenAtSequence: 2,
    });
  } finally {
    temp.ledger.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("integrity check reports records whose stored event no longer parses", () => {
  const temp = createTempLedger();
  try {
    const { events } = temp.ledger;
    const first = temp.ledger.atomically(() => events.append(registered));
    temp.ledger.atomically(() => events.append(shipped));

    const raw = new Database(temp.dbPath);
    try {
      raw
        .prepare("UPDATE audit_events SET event_json = ? WHERE sequence = 1")
        .run('{"type":"ProductRegistered","id":"SN-001"}');
    } finally {
      raw.close();
    }

    assert.deepEqual(events.verifyIntegrity(), {
      valid: false,
      checked: 0,
      headHash: "",
      brokenAtSequence: 1,
    });

    const rewrite = new Database(temp.dbPath);
    try {
      rewrite
        .prepare("UPDATE audit_events SET event_json = ? WHERE sequence = ?")
        .run(JSON.stringify(registered), 1);
      rewrite
        .prepare("UPDATE audit_events SET event_json = ? WHERE sequence = ?")
        .run("{not json", 2);
    } finally {
      rewrite.close();
    }

    assert.deepEqual(events.verifyIntegrity(), {
      valid: false,
      checked: 1,
      headHash: first.eventHash,
      brokenAtSequence: 2,
    });
  } finally {
    temp.ledger.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});
