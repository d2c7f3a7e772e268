export const INITIAL_PRODUCT_STATUS = "Registered at Manufacturing";

export interface Product {
  id: string;                     // opaque key, e.g. a serial number ("SN-001")
  currentOwner: string;           // identity currently holding custody
  registrationTimestamp: string;  // ISO date, fixed at registration
  isGenuine: boolean;             // always true today; reserved for revocation
  status: string;                 // free-form, never empty
  detailsUri: string;             // off-chain details reference, e.g. "ipfs://..."
}

export interface ProductVerification {
  isGenuine: boolean;
  status: string;
  currentOwner: string;
  detailsUri: string;
  registrationTimestamp: string;
}
