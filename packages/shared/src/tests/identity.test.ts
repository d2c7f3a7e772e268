import assert from "node:assert/strict";
import test from "node:test";
import {
  buildServiceAuthHeaders,
  isServiceAuthAuthorized,
  parseCallerIdHeader,
} from "../auth/request-identity.js";
import { canonicalJson, computeEventHash, sha256Hex } from "../crypto/event-hash.js";
import { isNullIdentity, isValidIdentity, NULL_IDENTITY } from "../types/identity.js";

test("treats blank strings and the zero address as the null identity", () => {
  assert.equal(isNullIdentity(""), true);
  assert.equal(isNullIdentity("   "), true);
  assert.equal(isNullIdentity(NULL_IDENTITY), true);
  assert.equal(isNullIdentity(` ${NULL_IDENTITY} `), true);
  assert.equal(isNullIdentity("0xabc"), false);
});

test("only non-null strings are valid identities", () => {
  assert.equal(isValidIdentity("distributor-7"), true);
  assert.equal(isValidIdentity(""), false);
  assert.equal(isValidIdentity(undefined), false);
  assert.equal(isValidIdentity(42), false);
});

test("identities with surrounding whitespace are not valid", () => {
  assert.equal(isValidIdentity(" distributor-7 "), false);
  assert.equal(isValidIdentity("distributor-7\n"), false);
  assert.equal(isValidIdentity("\tdistributor-7"), false);
  assert.equal(isValidIdentity("distributor 7"), true);
});

test("parses the caller header from a string or the first array entry", () => {
  assert.equal(parseCallerIdHeader("  maker "), "maker");
  assert.equal(parseCallerIdHeader(["d1", "d2"]), "d1");
  assert.equal(parseCallerIdHeader("   "), null);
  assert.equal(parseCallerIdHeader(undefined), null);
});

test("service auth is open without a token and exact with one", () => {
  assert.equal(isServiceAuthAuthorized(undefined, undefined), true);
  assert.equal(isServiceAuthAuthorized(undefined, "test-secret"), false);
  assert.equal(isServiceAuthAuthorized("test-secret", "test-secret"), true);
  assert.equal(isServiceAuthAuthorized(["other", "test-secret"], "test-secret"), true);
  assert.deepEqual(buildServiceAuthHeaders(" test-secret "), { "x-service-token": "test-secret" });
  assert.deepEqual(buildServiceAuthHeaders(""), {});
});

test("event hash covers sequence, previous hash and canonical event", () => {
  const event = {
    type: "StatusUpdated" as const,
    id: "SN-001",
    oldOwner: "maker",
    newOwner: "distributor",
    newStatus: "Shipped",
    timestamp: "2026-03-02T08:00:00.000Z",
  };
  assert.equal(
    canonicalJson({ b: 1, a: "x" }),
    '{"a":"x","b":1}',
  );
  const expected = sha256Hex(canonicalJson({ sequence: 2, previousHash: "abc", event }));
  assert.equal(computeEventHash(2, "abc", event), expected);
  assert.notEqual(computeEventHash(3, "abc", event), expected);
  assert.equal(sha256Hex("").length, 64);
});
