import {
  ChainNode,
  Config,
  CosignerConfig,
  CosignerPeer,
  DEFAULT_LISTEN_ADDRESS,
  DEFAULT_TIMEOUT,
  parseChainNodes,
  parseCosignerPeers,
  parseShareId,
} from './config';
import { InvariantViolationError, NoOpError } from './errors';
import { logger } from './logger';
import { reconcile, sameChainNode, sameCosignerPeer } from './reconcile';
import { ValidateOptions, validateConfig, validateOrFail } from './validate';

// Every operation here takes a Config and returns a new, validated one; the caller persists it.

export type CosignerInit = {
  peers: string;
  threshold: number;
  listen?: string;
  timeout?: string;
};

export type InitOptions = {
  homeDir: string;
  chainId: string;
  chainNodes: string;
  cosigner?: CosignerInit;
};

export function buildConfig(opts: InitOptions, v: ValidateOptions = {}): Config {
  const chainNodes = parseChainNodes(opts.chainNodes);
  const cfg: Config = { homeDir: opts.homeDir, chainId: opts.chainId, chainNodes };
  if (opts.cosigner) {
    cfg.cosigner = {
      threshold: opts.cosigner.threshold,
      listenAddress: opts.cosigner.listen ?? DEFAULT_LISTEN_ADDRESS,
      peers: parseCosignerPeers(opts.cosigner.peers),
      timeout: opts.cosigner.timeout ?? DEFAULT_TIMEOUT,
    };
  }
  return validateOrFail(cfg, v);
}

export function addChainNodes(cfg: Config, arg: string, v: ValidateOptions = {}): Config {
  const added = reconcile(cfg.chainNodes, parseChainNodes(arg), sameChainNode);
  if (added.length === 0) {
    throw new NoOpError('no new chain nodes specified in args');
  }
  return validateOrFail(withChainNodes(cfg, [...cfg.chainNodes, ...added]), v);
}

export function removeChainNodes(cfg: Config, arg: string, v: ValidateOptions = {}): Config {
  const survivors = reconcile(parseChainNodes(arg), cfg.chainNodes, sameChainNode);
  if (survivors.length === 0) {
    throw new InvariantViolationError('empty-after-removal', 'cannot remove all chain nodes from config, please leave at least one');
  }
  return validateOrFail(withChainNodes(cfg, survivors), v);
}

export type AddPeersOptions = ValidateOptions & {
  // commit even if the result fails validation, logging the problem instead
  force?: boolean;
};

export function addCosignerPeers(cfg: Config, arg: string, opts: AddPeersOptions = {}): Config {
  const cs = requireCosigner(cfg);
  const added = reconcile(cs.peers, parseCosignerPeers(arg), sameCosignerPeer);
  if (added.length === 0) {
    throw new NoOpError('no new peer nodes specified in args');
  }
  const next = withPeers(cfg, cs, [...cs.peers, ...added]);
  const res = validateConfig(next, opts);
  if (!res.success) {
    if (!opts.force) throw res.error;
    logger.warn(`committing peers despite failed validation (${res.error.code}): ${res.error.message}`);
  }
  return next;
}

/** `arg` lists `address|shareId` pairs, bare share IDs, or a mix of both. */
export function removeCosignerPeers(cfg: Config, arg: string, v: ValidateOptions = {}): Config {
  const cs = requireCosigner(cfg);
  const survivors = reconcile(peersToRemove(cs.peers, arg), cs.peers, sameCosignerPeer);
  if (survivors.length === 0) {
    throw new InvariantViolationError('empty-after-removal', 'cannot remove all peer nodes from config, please leave at least one');
  }
  return validateOrFail(withPeers(cfg, cs, survivors), v);
}

export function setChainId(cfg: Config, chainId: string, v: ValidateOptions = {}): Config {
  return validateOrFail({ ...cfg, chainId }, v);
}

function peersToRemove(stored: readonly CosignerPeer[], arg: string): CosignerPeer[] {
  return arg.split(',').map((s) => s.trim()).flatMap((element) => {
    if (element.includes('|')) return parseCosignerPeers(element);
    const id = parseShareId(element, element);
    return stored.filter((p) => p.shareId === id);
  });
}

function requireCosigner(cfg: Config): CosignerConfig {
  if (!cfg.cosigner) {
    throw new InvariantViolationError('not-cosigner', 'configuration is not a cosigner configuration, peers cannot be changed');
  }
  return cfg.cosigner;
}

function withChainNodes(cfg: Config, chainNodes: ChainNode[]): Config {
  return { ...cfg, chainNodes };
}

function withPeers(cfg: Config, cs: CosignerConfig, peers: CosignerPeer[]): Config {
  return { ...cfg, cosigner: { ...cs, peers } };
}
