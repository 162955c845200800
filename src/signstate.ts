import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { InputMalformedError } from './errors';

// Last height/round/step signed; the signing runtime refuses to sign below it.
export const SignStateSchema = z.object({
  height: z.number().int(),
  round: z.number().int(),
  step: z.number().int(),
  ephemeral_public: z.string().nullish().transform((v) => v ?? null),
  signature: z.string().nullish().transform((v) => v ?? null),
  signbytes: z.string().nullish().transform((v) => v ?? null),
});

export type SignState = z.infer<typeof SignStateSchema>;

export function zeroSignState(): SignState {
  return { height: 0, round: 0, step: 0, ephemeral_public: null, signature: null, signbytes: null };
}

export function signStatePath(home: string, chainId: string): string {
  return path.join(home, 'state', `${chainId}_priv_validator_state.json`);
}

export function shareSignStatePath(home: string, chainId: string): string {
  return path.join(home, 'state', `${chainId}_share_sign_state.json`);
}

export async function loadSignState(file: string): Promise<SignState> {
  const raw = await fs.readFile(file, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new InputMalformedError('malformed-file', `invalid JSON in sign state file ${file}`);
  }
  const res = SignStateSchema.safeParse(data);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new InputMalformedError('malformed-file', `invalid sign state in ${file}: ${issues}`);
  }
  return res.data;
}

/** Loads the record at `file`, writing a zeroed one first if there is none. */
export async function createOrLoadSignState(file: string): Promise<SignState> {
  try {
    return await loadSignState(file);
  } catch (e) {
    if (!isNotFound(e)) throw e;
  }
  const state = zeroSignState();
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(state, null, 2), { encoding: 'utf8', mode: 0o600 });
  return state;
}

export function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}
