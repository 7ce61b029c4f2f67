import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

/**
 * Computes the content fingerprint of an uploaded file: lowercase SHA-256 hex
 * over every byte of the file. Two files share a fingerprint only when their
 * bytes match.
 */
export async function computeFileHash(filePath: string): Promise<string> {
  const hash = createHash("sha256");

  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }

  return hash.digest("hex");
}
