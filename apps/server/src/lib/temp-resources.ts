import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "./logger.js";

/** Something a single ingestion owns and must release on every exit path. */
export interface Releasable {
  release(): Promise<void>;
}

export async function createTempDir(root: string, prefix: string): Promise<string> {
  return mkdtemp(join(root, `subforge-${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** A release handle that deletes `dir` and everything in it. Releasing twice is a no-op. */
export function ownedDirectory(dir: string): Releasable {
  let released = false;
  return {
    async release() {
      if (released) return;
      await removeDir(dir);
      released = true;
    },
  };
}

/**
 * Releases a resource without letting a cleanup failure escape: the failure
 * is logged and swallowed so it never replaces the error being propagated.
 */
export async function releaseQuietly(
  resource: Releasable | null,
  label: string,
  logger: Logger,
): Promise<void> {
  if (!resource) return;
  try {
    await resource.release();
  } catch (err) {
    logger.warn(`[cleanup] Failed to release ${label}: ${String(err)}`);
  }
}
