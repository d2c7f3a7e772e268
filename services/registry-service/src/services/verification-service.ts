import type { ProductVerification } from "@custody/shared";
import { fail, succeed, type OperationResult } from "../errors.js";
import type { ProductStore } from "../storage/product-store.js";

/** Public, read-only snapshot lookup. History comes from the audit log. */
export class VerificationService {
  constructor(private readonly products: ProductStore) {}

  verify(id: string): OperationResult<ProductVerification> {
    const product = this.products.get(id);
    if (!product) {
      return fail("NotFound", `Product '${id}' is not registered`);
    }
    return succeed({
      isGenuine: product.isGenuine,
      status: product.status,
      currentOwner: product.currentOwner,
      detailsUri: product.detailsUri,
      registrationTimestamp: product.registrationTimestamp,
    });
  }
}
