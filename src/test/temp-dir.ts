import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

export function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'anki-export-'));
}

export function removeTempDir(path: string): Promise<void> {
  return rm(path, { recursive: true, force: true });
}
