import { chmod, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Run a callback with a private temporary directory that is removed on every
 * exit path, including when the callback throws.
 *
 * @param prefix - Directory name prefix
 * @param fn - Work to run inside the directory
 */
export async function withWorkspace<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix));

  try {
    await chmod(dir, 0o700);
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
