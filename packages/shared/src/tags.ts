/**
 * @calsync/shared -- Tag extraction.
 *
 * Tags are never authored directly; they are the `#word` tokens found in a
 * record's title and body. Matching is case-insensitive for deduplication
 * but the first spelling seen is kept.
 */

import { MAX_TAG_LENGTH } from "./constants";

const TAG_PATTERN = /#[^\s#]+/g;
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

/**
 * Extract tags from one or more texts, in order of first appearance.
 *
 * extractTags("Sprint #Work", "notes #work #home") -> ["Work", "home"]
 */
export function extractTags(...texts: readonly string[]): string[] {
  const seen = new Set<string>();
  const tags: string[] = [];

  for (const text of texts) {
    for (const match of text.matchAll(TAG_PATTERN)) {
      const tag = match[0].slice(1).replace(CONTROL_CHARS, "");
      if (tag.length === 0 || tag.length > MAX_TAG_LENGTH) {
        continue;
      }
      const key = tag.toLowerCase();
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      tags.push(tag);
    }
  }

  return tags;
}
