import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Config } from '../src/config';
import { InputMalformedError, PreconditionError } from '../src/errors';
import { createOrLoadSignState, loadSignState, signStatePath, zeroSignState } from '../src/signstate';
import { ConfigStore, decodeConfig, encodeConfig } from '../src/storage';

const cfg: Config = {
  homeDir: '/tmp/signer',
  chainId: 'signer-1',
  cosigner: {
    threshold: 2,
    listenAddress: 'tcp://0.0.0.0:2222',
    peers: [
      { shareId: 2, address: 'tcp://10.168.1.2:2222' },
      { shareId: 3, address: 'tcp://10.168.1.3:2222' },
    ],
    timeout: '1500ms',
  },
  chainNodes: [{ address: 'tcp://10.168.0.1:1234' }],
};

describe('encodeConfig / decodeConfig', () => {
  it('writes kebab-case keys in file order', () => {
    const lines = encodeConfig(cfg).split('\n');
    expect(lines[0]).toBe('home-dir: /tmp/signer');
    expect(lines[1]).toBe('chain-id: signer-1');
    expect(lines[2]).toBe('cosigner:');
  });

  it('round-trips through yaml and json', () => {
    expect(decodeConfig(encodeConfig(cfg, 'yaml'), 'yaml')).toEqual(cfg);
    expect(decodeConfig(encodeConfig(cfg, 'json'), 'json')).toEqual(cfg);
  });

  it('uses the interchange field names in json', () => {
    expect(JSON.parse(encodeConfig(cfg, 'json'))).toEqual({
      'home-dir': '/tmp/signer',
      'chain-id': 'signer-1',
      cosigner: {
        threshold: 2,
        'p2p-listen': 'tcp://0.0.0.0:2222',
        peers: [
          { 'share-id': 2, 'p2p-addr': 'tcp://10.168.1.2:2222' },
          { 'share-id': 3, 'p2p-addr': 'tcp://10.168.1.3:2222' },
        ],
        'rpc-timeout': '1500ms',
      },
      'chain-nodes': [{ 'priv-val-addr': 'tcp://10.168.0.1:1234' }],
    });
  });

  it('reads a single-signer file without a cosigner section', () => {
    const text = 'home-dir: /tmp/signer\nchain-id: signer-1\nchain-nodes:\n  - priv-val-addr: tcp://10.168.0.1:1234\n';
    expect(decodeConfig(text)).toEqual({
      homeDir: '/tmp/signer',
      chainId: 'signer-1',
      chainNodes: [{ address: 'tcp://10.168.0.1:1234' }],
    });
  });

  it('lists schema problems', () => {
    expect(() => decodeConfig('{"chain-id": "signer-1"}', 'json', 'test.json')).toThrow(/home-dir: Required/);
  });

  it('rejects text that does not parse', () => {
    expect(() => decodeConfig('{', 'json')).toThrow(InputMalformedError);
    expect(() => decodeConfig('{', 'json')).toThrow(/^invalid json in config: /);
  });
});

describe('ConfigStore', () => {
  let tmp: string;
  let home: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'signer-store-'));
    home = path.join(tmp, 'home');
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it('initializes config and both sign states for a cosigner', async () => {
    const store = new ConfigStore(home);
    const files = await store.initialize({ ...cfg, homeDir: home });
    expect(files).toEqual([
      path.join(home, 'state', 'signer-1_priv_validator_state.json'),
      path.join(home, 'state', 'signer-1_share_sign_state.json'),
    ]);
    for (const f of files) {
      expect(await loadSignState(f)).toEqual(zeroSignState());
    }
    expect(await store.load()).toEqual({ ...cfg, homeDir: home });
  });

  it('provisions only the validator state for a single signer', async () => {
    const store = new ConfigStore(home);
    const files = await store.initialize({ ...cfg, homeDir: home, cosigner: undefined });
    expect(files).toEqual([path.join(home, 'state', 'signer-1_priv_validator_state.json')]);
  });

  it('accepts a missing or empty home and refuses a populated one', async () => {
    const store = new ConfigStore(home);
    await expect(store.assertUninitialized()).resolves.toBeUndefined();
    await fs.mkdir(home);
    await expect(store.assertUninitialized()).resolves.toBeUndefined();
    await fs.writeFile(path.join(home, 'notes.txt'), 'x');
    await expect(store.assertUninitialized()).rejects.toBeInstanceOf(PreconditionError);
  });

  it('reports a missing configuration', async () => {
    await expect(new ConfigStore(home).load()).rejects.toMatchObject({
      kind: 'precondition-failed',
      code: 'config-missing',
    });
  });

  it('leaves only config.yaml behind after saving', async () => {
    await new ConfigStore(home).save(cfg);
    expect(await fs.readdir(home)).toEqual(['config.yaml']);
  });

  it('reads the local share ID when a share is installed', async () => {
    const store = new ConfigStore(home);
    expect(await store.localShareId()).toBeUndefined();
    await fs.mkdir(home);
    await fs.writeFile(path.join(home, 'share.json'), JSON.stringify({ id: 3, shard: 'test-shard' }));
    expect(await store.localShareId()).toBe(3);
    await fs.writeFile(path.join(home, 'share.json'), JSON.stringify({ id: 'three' }));
    await expect(store.localShareId()).rejects.toMatchObject({ code: 'malformed-file' });
  });
});

describe('createOrLoadSignState', () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'signer-state-'));
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it('creates a zeroed record', async () => {
    const file = signStatePath(tmp, 'signer-1');
    expect(await createOrLoadSignState(file)).toEqual({
      height: 0,
      round: 0,
      step: 0,
      ephemeral_public: null,
      signature: null,
      signbytes: null,
    });
  });

  it('keeps an existing record', async () => {
    const file = signStatePath(tmp, 'signer-1');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ height: 42, round: 1, step: 3, signature: 'c2ln' }));
    expect(await createOrLoadSignState(file)).toEqual({
      height: 42,
      round: 1,
      step: 3,
      ephemeral_public: null,
      signature: 'c2ln',
      signbytes: null,
    });
  });
});
