import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Create a temporary directory, hand it to `action` and remove it afterwards,
 * whether `action` resolves or rejects.
 * @param prefix prefix of the directory name
 * @param action work to do with the directory
 */
export async function withTemporaryDirectory<T>(prefix: string, action: (directory: string) => Promise<T>): Promise<T> {
  const directory = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await action(directory);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}
