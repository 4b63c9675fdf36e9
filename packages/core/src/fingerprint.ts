import { createHash } from "node:crypto";

/**
 * Content fingerprint used as passage identity: the MD5 digest of the UTF-8
 * text, laid out as a UUID so vector indexes that require UUID point ids
 * accept it unchanged. A dedup key, not a security boundary.
 */
export function fingerprint(text: string): string {
  const hex = createHash("md5").update(text, "utf8").digest("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}
