import { mkdir, open } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import type { Readable } from 'node:stream';

/**
 * Expand a leading `~` to the current user's home directory
 */
export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

export interface LocalFileStream {
  body: Readable;
  size: number;
}

/**
 * Run `use` with a read stream over a local file. The file handle is closed
 * when `use` settles, whatever the outcome.
 */
export async function withFileStream<R>(path: string, use: (file: LocalFileStream) => Promise<R>): Promise<R> {
  const handle = await open(path, 'r');
  try {
    const { size } = await handle.stat();
    return await use({ body: handle.createReadStream({ autoClose: false }), size });
  } finally {
    await handle.close();
  }
}

/**
 * Write bytes to a local file, creating missing parent directories
 */
export async function writeLocalFile(path: string, data: Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const handle = await open(path, 'w');
  try {
    await handle.writeFile(data);
  } finally {
    await handle.close();
  }
}
