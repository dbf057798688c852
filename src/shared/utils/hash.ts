/**
 * Hashing Utilities
 *
 * Source ids fall back to a hash of the detail URL when the URL carries no
 * recognizable identifier.
 */
import crypto from "crypto";

/**
 * Computes a SHA-256 hash of an arbitrary string.
 *
 * @returns 64-character hex string
 */
export function hashString(value: string): string {
  return crypto.createHash("sha256").update(value, "utf8").digest("hex");
}

/** Short stable id for a URL (first 16 hex chars of its SHA-256) */
export function urlSourceId(url: string): string {
  return hashString(url).slice(0, 16);
}
