/**
 * @calsync/shared -- ULID generation and prefixed ID utilities.
 *
 * Locally generated IDs are prefixed ULIDs, e.g. "rec_01HXYZ...".
 * Remote item and collection IDs are opaque strings owned by the remote
 * service and never pass through here.
 */

import { monotonicFactory } from "ulid";
import { ID_PREFIXES } from "./constants";

// Within the same millisecond the random component is incremented rather
// than re-randomised, so successive IDs sort lexicographically.
const monotonic = monotonicFactory();

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Entity types that have prefixed IDs, derived from ID_PREFIXES keys. */
export type EntityType = keyof typeof ID_PREFIXES;

/** Every entity type, in declaration order. */
export const ENTITY_TYPES: readonly EntityType[] = ["record", "telemetry"];

// Crockford's Base32 character set -- used by ULID
const CROCKFORD_BASE32_REGEX = /^[0-9A-HJKMNP-TV-Z]{26}$/;

const PREFIX_TO_ENTITY = new Map<string, EntityType>();
for (const entity of ENTITY_TYPES) {
  PREFIX_TO_ENTITY.set(ID_PREFIXES[entity], entity);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Generate a new prefixed ULID for the given entity type.
 *
 * @returns A prefixed ULID string (e.g. "rec_01HXYZ...")
 */
export function generateId(entity: EntityType): string {
  return ID_PREFIXES[entity] + monotonic();
}

/**
 * Parse a prefixed ID into its entity type and raw ULID.
 *
 * @returns The parsed parts, or null if the ID is invalid
 */
export function parseId(
  id: string,
): { entity: EntityType; ulid: string } | null {
  if (id.length < 5) {
    return null;
  }

  // All prefixes are exactly 4 characters
  const entity = PREFIX_TO_ENTITY.get(id.slice(0, 4));
  if (entity === undefined) {
    return null;
  }

  const ulidPart = id.slice(4);
  if (!CROCKFORD_BASE32_REGEX.test(ulidPart)) {
    return null;
  }

  return { entity, ulid: ulidPart };
}

/**
 * Validate that a string is a well-formed prefixed ULID, optionally of a
 * given entity type.
 */
export function isValidId(id: string, expectedEntity?: EntityType): boolean {
  const parsed = parseId(id);
  if (parsed === null) {
    return false;
  }
  return expectedEntity === undefined || parsed.entity === expectedEntity;
}
