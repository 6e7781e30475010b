import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

const createTempDir = async (prefix: string) => {
  const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
  return dir;
};

export const cleanupTempDir = async (dir: string) => {
  await rm(dir, { recursive: true, force: true });
};

/** Run `fn` inside a fresh scratch directory that is removed afterwards. */
export const withTempDir = async <T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> => {
  const dir = await createTempDir(prefix);
  try {
    return await fn(dir);
  } finally {
    await cleanupTempDir(dir);
  }
};
