import { z } from 'zod';
import { InputMalformedError } from './errors';

export type ChainNode = { address: string };

export type CosignerPeer = { shareId: number; address: string };

export type CosignerConfig = {
  threshold: number;
  listenAddress: string;
  peers: CosignerPeer[];
  timeout: string; // duration string, e.g. 1500ms
};

export type Config = {
  homeDir: string;
  chainId: string;
  cosigner?: CosignerConfig; // present iff cosigner mode
  chainNodes: ChainNode[];
};

// What the signing runtime consumes.
export type NodeConfig = { address: string };
export type CosignerPeerConfig = { shareId: number; address: string };

export const DEFAULT_LISTEN_ADDRESS = 'tcp://0.0.0.0:2222';
export const DEFAULT_TIMEOUT = '1500ms';

// On-disk layout (config.yaml / config.json), kebab-case keys.
const ChainNodeFileSchema = z.object({
  'priv-val-addr': z.string(),
});

const CosignerPeerFileSchema = z.object({
  'share-id': z.number().int(),
  'p2p-addr': z.string(),
});

const CosignerFileSchema = z.object({
  threshold: z.number().int(),
  'p2p-listen': z.string(),
  peers: z.array(CosignerPeerFileSchema).nullish().transform((v) => v ?? []),
  'rpc-timeout': z.string(),
});

export const ConfigFileSchema = z.object({
  'home-dir': z.string(),
  'chain-id': z.string(),
  cosigner: CosignerFileSchema.nullish().transform((v) => v ?? undefined),
  'chain-nodes': z.array(ChainNodeFileSchema).nullish().transform((v) => v ?? []),
});

export type ConfigFile = z.input<typeof ConfigFileSchema>;

export function fromFile(data: z.output<typeof ConfigFileSchema>): Config {
  const cfg: Config = {
    homeDir: data['home-dir'],
    chainId: data['chain-id'],
    chainNodes: data['chain-nodes'].map((n) => ({ address: n['priv-val-addr'] })),
  };
  if (data.cosigner) {
    cfg.cosigner = {
      threshold: data.cosigner.threshold,
      listenAddress: data.cosigner['p2p-listen'],
      peers: data.cosigner.peers.map((p) => ({ shareId: p['share-id'], address: p['p2p-addr'] })),
      timeout: data.cosigner['rpc-timeout'],
    };
  }
  return cfg;
}

export function toFile(cfg: Config): ConfigFile {
  const out: ConfigFile = {
    'home-dir': cfg.homeDir,
    'chain-id': cfg.chainId,
  };
  if (cfg.cosigner) {
    out.cosigner = {
      threshold: cfg.cosigner.threshold,
      'p2p-listen': cfg.cosigner.listenAddress,
      peers: cfg.cosigner.peers.map((p) => ({ 'share-id': p.shareId, 'p2p-addr': p.address })),
      'rpc-timeout': cfg.cosigner.timeout,
    };
  }
  if (cfg.chainNodes.length > 0) {
    out['chain-nodes'] = cfg.chainNodes.map((n) => ({ 'priv-val-addr': n.address }));
  }
  return out;
}

/** Syntactic URL check only; no reachability or scheme allow-list. */
export function parsesAsUrl(s: string): boolean {
  try {
    new URL(s);
    return true;
  } catch {
    return false;
  }
}

// Stricter than parsesAsUrl: an address we are asked to dial needs host and port.
export function checkAddress(s: string): string | null {
  let u: URL;
  try {
    u = new URL(s);
  } catch {
    return 'not a valid URL (expected scheme://host:port)';
  }
  if (!u.hostname) return 'missing host';
  // URL drops a scheme's default port (http://node:80), so fall back to the raw authority
  if (!u.port && !hasExplicitPort(s)) return 'missing port';
  return null;
}

function hasExplicitPort(s: string): boolean {
  const authority = s.slice(s.indexOf('//') + 2).split(/[/?#]/, 1)[0];
  return /:\d+$/.test(authority);
}

function splitList(arg: string): string[] {
  return arg.split(',').map((s) => s.trim());
}

export function parseChainNodes(arg: string): ChainNode[] {
  return splitList(arg).map((address) => {
    const problem = checkAddress(address);
    if (problem) {
      throw new InputMalformedError('malformed-address', `invalid chain node "${address}": ${problem}`);
    }
    return { address };
  });
}

export function parseShareId(s: string, element: string): number {
  if (!/^[+-]?\d+$/.test(s)) {
    throw new InputMalformedError('malformed-share-id', `invalid share ID "${s}" in "${element}": not an integer`);
  }
  const n = Number(s);
  if (!Number.isSafeInteger(n)) {
    throw new InputMalformedError('malformed-share-id', `invalid share ID "${s}" in "${element}": out of range`);
  }
  return n === 0 ? 0 : n; // no -0
}

/** Parses `tcp://host:port|shareId,...`. */
export function parseCosignerPeers(arg: string): CosignerPeer[] {
  return splitList(arg).map((element) => {
    const parts = element.split('|');
    if (parts.length !== 2) {
      throw new InputMalformedError('malformed-peer', `invalid peer "${element}": expected <address>|<share-id>`);
    }
    const [address, id] = parts;
    const shareId = parseShareId(id.trim(), element);
    const problem = checkAddress(address.trim());
    if (problem) {
      throw new InputMalformedError('malformed-address', `invalid peer address "${address}": ${problem}`);
    }
    return { shareId, address: address.trim() };
  });
}

export function nodeConfigs(cfg: Config): NodeConfig[] {
  return cfg.chainNodes.map((n) => ({ address: n.address }));
}

export function cosignerPeerConfigs(cfg: Config): CosignerPeerConfig[] {
  return (cfg.cosigner?.peers ?? []).map((p) => ({ shareId: p.shareId, address: p.address }));
}
