import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes the file through a temporary sibling and a rename, so readers never see
 * a half-written file.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}
