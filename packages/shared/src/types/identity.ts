export const NULL_IDENTITY = "0x0000000000000000000000000000000000000000";

/**
 * Identities are opaque strings (account addresses, DIDs, org handles).
 * Blank strings and the zero address both count as the null identity.
 */
export function isNullIdentity(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.length === 0 || trimmed.toLowerCase() === NULL_IDENTITY;
}

/**
 * Surrounding whitespace is rejected rather than trimmed: callers are matched
 * against stored identities byte for byte.
 */
export function isValidIdentity(value: unknown): value is string {
  return typeof value === "string" && value === value.trim() && !isNullIdentity(value);
}
