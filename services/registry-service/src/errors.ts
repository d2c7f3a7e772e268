import type { RegistryErrorCode } from "@custody/shared";

export interface RegistryFailure {
  ok: false;
  code: RegistryErrorCode;
  message: string;
}

export type OperationResult<T> = { ok: true; value: T } | RegistryFailure;

export type GuardResult = { ok: true } | RegistryFailure;

export function succeed<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail(code: RegistryErrorCode, message: string): RegistryFailure {
  return { ok: false, code, message };
}

export const HTTP_ERRORS: Record<RegistryErrorCode, { statusCode: number; error: string }> = {
  Unauthorized: { statusCode: 403, error: "unauthorized" },
  EmptyId: { statusCode: 400, error: "empty_id" },
  DuplicateId: { statusCode: 409, error: "duplicate_id" },
  NotFound: { statusCode: 404, error: "product_not_found" },
  InvalidOwner: { statusCode: 400, error: "invalid_owner" },
  EmptyStatus: { statusCode: 400, error: "empty_status" },
};
