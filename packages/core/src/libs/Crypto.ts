import { createHash } from "node:crypto";
import { canonicalEncode } from "./Encoding";

function sha256Hex(input: string): string {
  return "0x" + createHash("sha256").update(input, "utf8").digest("hex");
}

/**
 * Hash an object using SHA-256 after canonical encoding.
 */
export function hashState(state: unknown): string {
  return sha256Hex(canonicalEncode(state));
}

/**
 * Compute the hash chain link: H(prevHash || currentData).
 */
export function chainHash(prevHash: string, data: unknown): string {
  return sha256Hex(prevHash + canonicalEncode(data));
}
