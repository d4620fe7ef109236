import { createHash } from "crypto";

/**
 * SHA-256 of the PDF bytes as hex. Identifies the same invoice uploaded
 * twice under different names or folders.
 */
export function sha256Buffer(buffer: Buffer): string {
  return createHash("sha256").update(buffer).digest("hex");
}
