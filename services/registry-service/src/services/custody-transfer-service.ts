import { isValidIdentity, type AuditRecord, type Product } from "@custody/shared";
import type { AccessControlGuard } from "../access/access-control-guard.js";
import { fail, succeed, type OperationResult } from "../errors.js";
import type { RegistryLedger } from "../storage/registry-ledger.js";
import { systemClock, type Clock } from "./clock.js";

export interface TransferOutcome {
  product: Product;
  previousOwner: string;
  record: AuditRecord;
}

export class CustodyTransferService {
  constructor(
    private readonly guard: AccessControlGuard,
    private readonly ledger: RegistryLedger,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Hands custody of `id` to `newOwnerId` with a new status. Only the current
   * holder may call it; once it succeeds the caller can no longer move the
   * product. Checks run NotFound, Unauthorized, InvalidOwner, EmptyStatus.
   */
  transfer(
    callerId: string,
    id: string,
    newStatus: string,
    newOwnerId: string,
  ): OperationResult<TransferOutcome> {
    return this.ledger.atomically((): OperationResult<TransferOutcome> => {
      const current = this.ledger.products.get(id);
      if (!current) {
        return fail("NotFound", `Product '${id}' is not registered`);
      }

      const allowed = this.guard.requireCurrentOwner(id, callerId);
      if (!allowed.ok) return allowed;

      if (!isValidIdentity(newOwnerId)) {
        return fail("InvalidOwner", "New owner must be a non-null identity");
      }
      if (newStatus.trim().length === 0) {
        return fail("EmptyStatus", "Status must not be empty");
      }

      const updated = this.ledger.products.update(id, newStatus, newOwnerId);
      if (!updated.ok) return updated;

      const record = this.ledger.events.append({
        type: "StatusUpdated",
        id,
        oldOwner: current.currentOwner,
        newOwner: newOwnerId,
        newStatus,
        timestamp: this.clock().toISOString(),
      });

      return succeed({ product: updated.value, previousOwner: current.currentOwner, record });
    });
  }
}
