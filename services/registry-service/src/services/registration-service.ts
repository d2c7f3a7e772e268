import { INITIAL_PRODUCT_STATUS, type AuditRecord, type Product } from "@custody/shared";
import type { AccessControlGuard } from "../access/access-control-guard.js";
import { fail, succeed, type OperationResult } from "../errors.js";
import type { RegistryLedger } from "../storage/registry-ledger.js";
import { systemClock, type Clock } from "./clock.js";

export interface RegistrationOutcome {
  product: Product;
  record: AuditRecord;
}

export class RegistrationService {
  constructor(
    private readonly guard: AccessControlGuard,
    private readonly ledger: RegistryLedger,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Creates the product under `id` with the authority as first custodian and
   * emits `ProductRegistered`. Fails Unauthorized, EmptyId or DuplicateId,
   * in that order, without touching the store or the log.
   */
  register(callerId: string, id: string, detailsUri: string): OperationResult<RegistrationOutcome> {
    return this.ledger.atomically((): OperationResult<RegistrationOutcome> => {
      const allowed = this.guard.requireAuthority(callerId);
      if (!allowed.ok) return allowed;

      if (id.trim().length === 0) {
        return fail("EmptyId", "Product id must not be empty");
      }
      if (this.ledger.products.exists(id)) {
        return fail("DuplicateId", `Product '${id}' is already registered`);
      }

      const timestamp = this.clock().toISOString();
      const inserted = this.ledger.products.insert(id, {
        id,
        currentOwner: this.guard.authority,
        registrationTimestamp: timestamp,
        isGenuine: true,
        status: INITIAL_PRODUCT_STATUS,
        detailsUri,
      });
      if (!inserted.ok) return inserted;

      const record = this.ledger.events.append({
        type: "ProductRegistered",
        id,
        authorityId: this.guard.authority,
        timestamp,
        detailsUri,
      });

      return succeed({ product: inserted.value, record });
    });
  }
}
