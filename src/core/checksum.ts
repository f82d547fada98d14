import { createHash } from "node:crypto";

/** Compute SHA256 hash of a string/buffer. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Fold named parts into one fingerprint. Order-independent: parts are sorted by name first.
 */
export function combineFingerprints(parts: Array<[name: string, value: string]>): string {
  const hash = createHash("sha256");
  const sorted = [...parts].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [name, value] of sorted) {
    hash.update(name).update("\0").update(value).update("\n");
  }
  return hash.digest("hex");
}
