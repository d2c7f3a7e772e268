import { canonicalize } from "json-canonicalize";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import type { AuditEvent } from "../types/events.js";

/**
 * Canonical JSON per RFC 8785 (JCS).
 * Canonicalize before hashing for stable outputs.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

export function sha256Hex(input: string): string {
  return bytesToHex(sha256(utf8ToBytes(input)));
}

export function computeEventHash(
  sequence: number,
  previousHash: string,
  event: AuditEvent,
): string {
  return sha256Hex(canonicalJson({ sequence, previousHash, event }));
}
