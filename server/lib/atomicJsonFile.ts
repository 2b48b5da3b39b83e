/**
 * Versioned JSON files replaced atomically.
 *
 * Writes go to a temporary sibling and are renamed over the target, so a
 * reader opening the path sees either the previous file or the complete new
 * one. Every file is an envelope `{ schemaVersion, savedAt, payload }`.
 */

import { mkdir, open, readFile, rename, unlink } from 'node:fs/promises';
import { dirname, basename, join } from 'node:path';
import { z } from 'zod';
import { StorageError, errnoCode, errorMessage } from './errors.js';

const EnvelopeSchema = z.object({
  schemaVersion: z.number().int(),
  savedAt: z.string(),
  payload: z.unknown(),
});

export type ReadResult<T> =
  | { status: 'ok'; value: T; savedAt: string }
  | { status: 'missing' }
  | { status: 'invalid'; reason: string };

let tempCounter = 0;

function tempPathFor(path: string): string {
  tempCounter += 1;
  return join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.${tempCounter}.tmp`);
}

/** Write `payload` to `path` via temp file + fsync + rename. Throws StorageError. */
export async function writeJsonAtomic(path: string, schemaVersion: number, payload: unknown): Promise<void> {
  const tempPath = tempPathFor(path);
  const body = JSON.stringify({ schemaVersion, savedAt: new Date().toISOString(), payload }, null, 2);
  try {
    await mkdir(dirname(path), { recursive: true });
    const handle = await open(tempPath, 'w');
    try {
      await handle.writeFile(body, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, path);
  } catch (err: unknown) {
    await unlink(tempPath).catch((cleanupErr: unknown) => {
      if (errnoCode(cleanupErr) !== 'ENOENT') {
        console.warn(`[storage] could not remove ${tempPath}: ${errorMessage(cleanupErr)}`);
      }
    });
    throw new StorageError(path, err);
  }
}

/**
 * Read and validate a versioned file. A missing file is `missing`; anything
 * unreadable, of another schema version, or failing validation is `invalid`.
 */
export async function readJsonVersioned<T>(
  path: string,
  schemaVersion: number,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<ReadResult<T>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err: unknown) {
    if (errnoCode(err) === 'ENOENT') return { status: 'missing' };
    return { status: 'invalid', reason: errorMessage(err) };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    return { status: 'invalid', reason: `not JSON: ${errorMessage(err)}` };
  }

  const envelope = EnvelopeSchema.safeParse(raw);
  if (!envelope.success) return { status: 'invalid', reason: 'missing version envelope' };
  if (envelope.data.schemaVersion !== schemaVersion) {
    return {
      status: 'invalid',
      reason: `schema version ${envelope.data.schemaVersion} (expected ${schemaVersion})`,
    };
  }

  const parsed = schema.safeParse(envelope.data.payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { status: 'invalid', reason: `${issue.path.join('.') || '(root)'}: ${issue.message}` };
  }
  return { status: 'ok', value: parsed.data, savedAt: envelope.data.savedAt };
}
