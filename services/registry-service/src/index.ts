export { AccessControlGuard, type AccessControlGuardOptions } from "./access/access-control-guard.js";
export {
  fail,
  succeed,
  HTTP_ERRORS,
  type GuardResult,
  type OperationResult,
  type RegistryFailure,
} from "./errors.js";
export { systemClock, type Clock } from "./services/clock.js";
export { CustodyTransferService, type TransferOutcome } from "./services/custody-transfer-service.js";
export { RegistrationService, type RegistrationOutcome } from "./services/registration-service.js";
export { VerificationService } from "./services/verification-service.js";
export { SqliteAuditEventLog, type AuditEventLog } from "./storage/audit-event-log.js";
export { SqliteProductStore, type ProductStore } from "./storage/product-store.js";
export { SqliteRegistryLedger, type RegistryLedger } from "./storage/registry-ledger.js";
export { buildServer, type BuildServerOptions } from "./server.js";
