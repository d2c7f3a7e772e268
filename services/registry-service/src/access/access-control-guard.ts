import type { ProductStore } from "../storage/product-store.js";
import { fail, type GuardResult } from "../errors.js";

export interface AccessControlGuardOptions {
  authorityId: string;
  products: ProductStore;
}

/**
 * Capability checks for the two roles the registry knows: the single
 * registering authority and the current holder of a product.
 */
export class AccessControlGuard {
  private readonly authorityId: string;
  private readonly products: ProductStore;

  constructor(options: AccessControlGuardOptions) {
    this.authorityId = options.authorityId;
    this.products = options.products;
  }

  get authority(): string {
    return this.authorityId;
  }

  isAuthority(callerId: string): boolean {
    return callerId === this.authorityId;
  }

  isCurrentOwner(productId: string, callerId: string): boolean {
    const product = this.products.get(productId);
    return product !== null && product.currentOwner === callerId;
  }

  requireAuthority(callerId: string): GuardResult {
    if (this.isAuthority(callerId)) return { ok: true };
    return fail("Unauthorized", `'${callerId}' is not the registering authority`);
  }

  requireCurrentOwner(productId: string, callerId: string): GuardResult {
    if (this.isCurrentOwner(productId, callerId)) return { ok: true };
    return fail("Unauthorized", `'${callerId}' does not hold custody of '${productId}'`);
  }
}
