/**
 * @calsync/shared -- Stable hashing for telemetry identifiers.
 *
 * Telemetry never stores raw collection ids; it stores the first 8 hex
 * characters of their SHA-256 digest, enough to correlate entries for the
 * same collection without revealing which calendar it is.
 *
 * Uses the Web Crypto API (crypto.subtle), available as a global in Node 20.
 */

/** Length of the truncated collection hash. */
const COLLECTION_HASH_LENGTH = 8;

/**
 * Convert an ArrayBuffer to a lowercase hex string.
 */
function bufferToHex(buffer: ArrayBuffer): string {
  const bytes = new Uint8Array(buffer);
  const hexParts: string[] = [];
  for (const byte of bytes) {
    hexParts.push(byte.toString(16).padStart(2, "0"));
  }
  return hexParts.join("");
}

/**
 * Compute SHA-256 hash of a string using the Web Crypto API.
 *
 * @returns A 64-character lowercase hex digest
 */
export async function sha256(input: string): Promise<string> {
  const encoded = new TextEncoder().encode(input);
  const digest = await crypto.subtle.digest("SHA-256", encoded);
  return bufferToHex(digest);
}

/** Truncated SHA-256 of a collection id, as stored in telemetry. */
export async function collectionHash(collectionId: string): Promise<string> {
  return (await sha256(collectionId)).slice(0, COLLECTION_HASH_LENGTH);
}
