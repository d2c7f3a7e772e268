export * from "./crypto/event-hash.js";
export * from "./auth/request-identity.js";
export * from "./history/custody-chain.js";
export * from "./types/identity.js";
export * from "./types/product.js";
export * from "./types/events.js";
export * from "./types/api.js";
