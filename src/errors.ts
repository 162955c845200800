import { inspect } from 'util';

export type ErrorKind = 'input-malformed' | 'invariant-violated' | 'no-op' | 'precondition-failed';

export type MalformedCode =
  | 'malformed-address'
  | 'malformed-peer'
  | 'malformed-share-id'
  | 'malformed-timeout'
  | 'malformed-listen-address'
  | 'malformed-file'
  | 'malformed-chain-id'
  | 'malformed-env';

export type InvariantCode =
  | 'empty-chain-id'
  | 'no-chain-nodes'
  | 'invalid-threshold'
  | 'threshold-infeasible'
  | 'duplicate-share-id'
  | 'share-id-conflict'
  | 'not-cosigner'
  | 'empty-after-removal';

export abstract class ConfigError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: string;
}

/** Unparseable address, integer, duration or file; wrong field count. */
export class InputMalformedError extends ConfigError {
  readonly kind = 'input-malformed';
  constructor(readonly code: MalformedCode, message: string) {
    super(message);
    this.name = 'InputMalformedError';
  }
}

export class InvariantViolationError extends ConfigError {
  readonly kind = 'invariant-violated';
  constructor(readonly code: InvariantCode, message: string, readonly shareIds: number[] = []) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/** Reconciliation left nothing to add. */
export class NoOpError extends ConfigError {
  readonly kind = 'no-op';
  readonly code = 'nothing-to-do';
  constructor(message: string) {
    super(message);
    this.name = 'NoOpError';
  }
}

export class PreconditionError extends ConfigError {
  readonly kind = 'precondition-failed';
  constructor(readonly code: 'home-not-empty' | 'config-missing', message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export function errorMsg(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStack(error: unknown): string {
  return inspect(error, { depth: 5 });
}
