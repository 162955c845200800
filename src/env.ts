import os from 'os';
import path from 'path';
import { z } from 'zod';
import { InputMalformedError } from './errors';

const envSchema = z.object({
  SIGNER_HOME: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export type LoadedEnv = { env: Env; error?: InputMalformedError };

/** Falls back to the defaults on a bad variable; the error is reported once the CLI runs. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): LoadedEnv {
  const res = envSchema.safeParse(source);
  if (res.success) return { env: res.data };
  const issues = res.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  return {
    env: envSchema.parse({}),
    error: new InputMalformedError('malformed-env', `invalid environment: ${issues}`),
  };
}

const loaded = loadEnv();

export const env: Env = loaded.env;
export const envError: InputMalformedError | undefined = loaded.error;

export const DEFAULT_HOME_NAME = '.signer';

/** --home wins, then SIGNER_HOME, then ~/.signer. */
export function resolveHome(flag?: string, e: Env = env): string {
  if (flag) return path.resolve(flag);
  if (e.SIGNER_HOME) return path.resolve(e.SIGNER_HOME);
  return path.join(os.homedir(), DEFAULT_HOME_NAME);
}
