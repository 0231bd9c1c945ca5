import { createHash } from "node:crypto";

/** First 8 hex chars of the SHA-256 of `text`. */
export function shortDigest(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex").slice(0, 8);
}
