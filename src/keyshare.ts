import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { InputMalformedError } from './errors';
import { isNotFound } from './signstate';

export const KEY_SHARE_FILE = 'share.json';

// Only the ID matters here; the key material stays with the signing runtime.
const KeyShareSchema = z.object({ id: z.number().int() }).passthrough();

/** Share ID of the key installed in `home`, or undefined when no share is installed yet. */
export async function readLocalShareId(home: string): Promise<number | undefined> {
  const file = path.join(home, KEY_SHARE_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (e) {
    if (isNotFound(e)) return undefined;
    throw e;
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new InputMalformedError('malformed-file', `invalid JSON in key share file ${file}`);
  }
  const res = KeyShareSchema.safeParse(data);
  if (!res.success) {
    throw new InputMalformedError('malformed-file', `key share file ${file} has no integer "id"`);
  }
  return res.data.id;
}
