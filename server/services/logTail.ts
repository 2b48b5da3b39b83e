import { readFile } from 'node:fs/promises';
import { errnoCode } from '../lib/errors.js';

/** Last `maxLines` non-empty lines of a text file; a missing file yields []. */
export async function readLogTail(path: string, maxLines: number): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err: unknown) {
    if (errnoCode(err) === 'ENOENT') return [];
    throw err;
  }
  const limit = Math.max(0, Math.floor(maxLines));
  if (limit === 0) return [];
  const lines = text.split(/\r?\n/).filter((line) => line.length > 0);
  return lines.slice(-limit);
}
