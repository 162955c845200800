import { Config, CosignerPeer, parsesAsUrl } from './config';
import { isDuration } from './duration';
import { ConfigError, InputMalformedError, InvariantViolationError } from './errors';

export type ValidationResult<T> = {
  success: true;
  value: T;
} | {
  success: false;
  error: ConfigError;
};

export type ValidateOptions = {
  // ID of the share held by this node, when known; peers must not reuse it.
  localShareId?: number;
};

/** Share IDs seen more than once, each reported once, in order of first repeat. */
export function duplicateShareIds(peers: readonly CosignerPeer[]): number[] {
  const seen = new Set<number>();
  const dups: number[] = [];
  for (const p of peers) {
    if (seen.has(p.shareId) && !dups.includes(p.shareId)) dups.push(p.shareId);
    seen.add(p.shareId);
  }
  return dups;
}

function checkPeers(peers: readonly CosignerPeer[], opts: ValidateOptions): ConfigError | null {
  const dups = duplicateShareIds(peers);
  if (dups.length > 0) {
    return new InvariantViolationError('duplicate-share-id', `found duplicates for peer IDs: [${dups.join(', ')}]`, dups);
  }

  for (const p of peers) {
    if (!parsesAsUrl(p.address)) {
      return new InputMalformedError('malformed-address', `peer ${p.shareId} has an invalid address "${p.address}"`);
    }
  }

  if (opts.localShareId !== undefined && peers.some((p) => p.shareId === opts.localShareId)) {
    return new InvariantViolationError(
      'share-id-conflict',
      `local key share ID ${opts.localShareId} matches a configured peer, check that the correct share is installed`,
      [opts.localShareId],
    );
  }
  return null;
}

function check(cfg: Config, opts: ValidateOptions): ConfigError | null {
  if (cfg.chainId === '') {
    return new InvariantViolationError('empty-chain-id', 'chain-id cannot be empty');
  }
  // names the sign state files under state/
  if (/[/\\]/.test(cfg.chainId) || cfg.chainId.includes('..')) {
    return new InputMalformedError('malformed-chain-id', `chain-id "${cfg.chainId}" cannot contain "/", "\\" or ".."`);
  }
  if (cfg.chainNodes.length === 0) {
    return new InvariantViolationError('no-chain-nodes', 'need to have a node configured to sign for');
  }
  for (const n of cfg.chainNodes) {
    if (!parsesAsUrl(n.address)) {
      return new InputMalformedError('malformed-address', `invalid chain node address "${n.address}"`);
    }
  }

  const cs = cfg.cosigner;
  if (!cs) return null;

  if (!Number.isInteger(cs.threshold) || cs.threshold < 1) {
    return new InvariantViolationError('invalid-threshold', `threshold must be a positive integer, got ${cs.threshold}`);
  }
  if (cs.peers.length + 1 < cs.threshold) {
    return new InvariantViolationError(
      'threshold-infeasible',
      `number of peers + 1 (${cs.peers.length + 1}) must be greater than or equal to threshold (${cs.threshold})`,
    );
  }
  if (!isDuration(cs.timeout)) {
    return new InputMalformedError('malformed-timeout', `"${cs.timeout}" is not a valid duration string for the rpc timeout`);
  }
  if (!parsesAsUrl(cs.listenAddress)) {
    return new InputMalformedError('malformed-listen-address', `failed to parse p2p listen address "${cs.listenAddress}"`);
  }
  return checkPeers(cs.peers, opts);
}

export function validateConfig(cfg: Config, opts: ValidateOptions = {}): ValidationResult<Config> {
  const error = check(cfg, opts);
  if (error) return { success: false, error };
  return { success: true, value: cfg };
}

export function validateOrFail(cfg: Config, opts: ValidateOptions = {}): Config {
  const result = validateConfig(cfg, opts);
  if (!result.success) throw result.error;
  return result.value;
}
