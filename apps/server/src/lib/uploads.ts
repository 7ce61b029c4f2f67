import { writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileExtension } from "@subforge/shared";
import { createTempDir, ownedDirectory, removeDir, type Releasable } from "./temp-resources.js";

/** An uploaded file staged on disk for one ingestion. */
export interface UploadedMedia extends Releasable {
  readonly path: string;
  /** Name the client sent; used for output naming and type detection only. */
  readonly originalFilename: string;
}

/**
 * Writes upload bytes to a private temp directory. The staged file keeps the
 * client's extension but never its name.
 */
export async function stageUpload(
  bytes: Uint8Array,
  originalFilename: string,
  tempRoot: string = tmpdir(),
): Promise<UploadedMedia> {
  const dir = await createTempDir(tempRoot, "upload");
  const ext = fileExtension(originalFilename);
  const path = join(dir, ext ? `upload.${ext}` : "upload");

  try {
    await writeFile(path, bytes);
  } catch (err) {
    await removeDir(dir);
    throw err;
  }

  const owner = ownedDirectory(dir);
  return { path, originalFilename, release: () => owner.release() };
}
