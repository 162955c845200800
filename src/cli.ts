#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { Config, DEFAULT_LISTEN_ADDRESS, DEFAULT_TIMEOUT } from './config';
import {
  CosignerInit,
  addChainNodes,
  addCosignerPeers,
  buildConfig,
  removeChainNodes,
  removeCosignerPeers,
  setChainId,
} from './commands';
import { envError, resolveHome } from './env';
import { ConfigError, InputMalformedError, InvariantViolationError, errorMsg, errorStack } from './errors';
import { logger } from './logger';
import { ConfigStore, Format, encodeConfig } from './storage';
import { validateOrFail } from './validate';

type GlobalFlags = { home?: string };

type InitFlags = {
  cosigner?: boolean;
  peers?: string;
  threshold?: number;
  listen: string;
  timeout: string;
};

function parseIntArg(v: string): number {
  if (!/^[+-]?\d+$/.test(v.trim())) throw new InvalidArgumentError('not an integer');
  return Number(v);
}

function storeFor(cmd: Command): ConfigStore {
  return new ConfigStore(resolveHome(cmd.optsWithGlobals<GlobalFlags>().home));
}

/** load → transform → persist, with the local key share ID fed to validation. */
async function mutate(cmd: Command, fn: (cfg: Config, localShareId: number | undefined) => Config): Promise<Config> {
  const store = storeFor(cmd);
  const cfg = await store.load();
  const next = fn(cfg, await store.localShareId());
  await store.save(next);
  if (next.chainId !== cfg.chainId) await store.provisionSignStates(next);
  return next;
}

function printNodes(cfg: Config) {
  console.log(`chain nodes: ${cfg.chainNodes.map((n) => n.address).join(', ')}`);
}

function printPeers(cfg: Config) {
  const peers = cfg.cosigner?.peers ?? [];
  console.log(`peers: ${peers.map((p) => `${p.address}|${p.shareId}`).join(', ')}`);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('signerctl')
    .description('Configure a validator signer and its cosigner peers')
    .version('0.1.0')
    .option('--home <dir>', 'home directory (default: $SIGNER_HOME or ~/.signer)');

  const config = program.command('config').description('Commands to configure the signer');

  config.command('init')
    .alias('i')
    .description("initialize configuration file and home directory if one doesn't already exist")
    .argument('<chain-id>', 'chain id of the chain to validate')
    .argument('<chain-nodes>', 'comma-separated chain node addresses, e.g. tcp://chain-node-1:1234,tcp://chain-node-2:1234')
    .option('-c, --cosigner', 'initialize a cosigner node, requires --peers and --threshold')
    .option('-p, --peers <list>', 'cosigner peers as tcp://{addr}:{port}|{share-id}, e.g. "tcp://node-1:2222|2,tcp://node-2:2222|3"')
    .option('-t, --threshold <n>', 'number of signatures required for a threshold signature', parseIntArg)
    .option('-l, --listen <addr>', 'listen address of the signer', DEFAULT_LISTEN_ADDRESS)
    .option('--timeout <duration>', 'cosigner rpc timeout, e.g. 1s, 1000ms, 1.5m', DEFAULT_TIMEOUT)
    .action(async (chainId: string, chainNodes: string, opts: InitFlags, cmd: Command) => {
      const store = storeFor(cmd);
      await store.assertUninitialized();

      let cosigner: CosignerInit | undefined;
      if (opts.cosigner) {
        if (!opts.peers) throw new InputMalformedError('malformed-peer', '--peers is required with --cosigner');
        if (opts.threshold === undefined) {
          throw new InvariantViolationError('invalid-threshold', '--threshold is required with --cosigner');
        }
        cosigner = { peers: opts.peers, threshold: opts.threshold, listen: opts.listen, timeout: opts.timeout };
      }
      const cfg = buildConfig({ homeDir: store.root, chainId, chainNodes, cosigner });
      const files = await store.initialize(cfg);
      console.log(`initialized ${store.configPath()}`);
      files.forEach((f) => console.log(`  ${f}`));
    });

  const nodes = config.command('nodes').description('Commands to configure the chain nodes');

  nodes.command('add')
    .alias('a')
    .description("add chain node(s) to the signer's configuration")
    .argument('<chain-nodes>', 'comma-separated chain node addresses')
    .action(async (arg: string, _opts: unknown, cmd: Command) => {
      printNodes(await mutate(cmd, (cfg, localShareId) => addChainNodes(cfg, arg, { localShareId })));
    });

  nodes.command('remove')
    .alias('r')
    .description("remove chain node(s) from the signer's configuration")
    .argument('<chain-nodes>', 'comma-separated chain node addresses')
    .action(async (arg: string, _opts: unknown, cmd: Command) => {
      printNodes(await mutate(cmd, (cfg, localShareId) => removeChainNodes(cfg, arg, { localShareId })));
    });

  const peers = config.command('peers').description('Commands to configure the cosigner peers');

  peers.command('add')
    .alias('a')
    .description("add peer(s) to the cosigner's configuration")
    .argument('<peers>', 'comma-separated peers, e.g. tcp://peer-1:2222|2,tcp://peer-2:2222|3')
    .option('--force', 'save the peers even if the resulting configuration fails validation')
    .action(async (arg: string, opts: { force?: boolean }, cmd: Command) => {
      printPeers(await mutate(cmd, (cfg, localShareId) => addCosignerPeers(cfg, arg, { localShareId, force: opts.force })));
    });

  peers.command('remove')
    .alias('r')
    .description("remove peer(s) from the cosigner's configuration")
    .argument('<peers>', 'comma-separated peers (address|share-id) or share IDs, e.g. 3,4')
    .action(async (arg: string, _opts: unknown, cmd: Command) => {
      printPeers(await mutate(cmd, (cfg, localShareId) => removeCosignerPeers(cfg, arg, { localShareId })));
    });

  config.command('set-chain-id')
    .alias('id')
    .description('set the chain ID')
    .argument('<chain-id>', 'e.g. cosmoshub-4')
    .action(async (chainId: string, _opts: unknown, cmd: Command) => {
      const cfg = await mutate(cmd, (c, localShareId) => setChainId(c, chainId, { localShareId }));
      console.log(`chain-id: ${cfg.chainId}`);
    });

  config.command('show')
    .description('print the configuration')
    .addOption(new Option('--format <format>', 'output format').choices(['yaml', 'json']).default('yaml'))
    .action(async (opts: { format: Format }, cmd: Command) => {
      const cfg = await storeFor(cmd).load();
      process.stdout.write(encodeConfig(cfg, opts.format));
    });

  config.command('validate')
    .description('check the stored configuration')
    .action(async (_opts: unknown, cmd: Command) => {
      const store = storeFor(cmd);
      validateOrFail(await store.load(), { localShareId: await store.localShareId() });
      console.log(`${store.configPath()} is valid`);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  if (envError) throw envError;
  await createProgram().parseAsync(argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(`error (${error.kind}): ${error.message}`);
    } else {
      logger.error(errorStack(error));
      console.error(`error: ${errorMsg(error)}`);
    }
    process.exitCode = 1;
  });
}
