import * as fs from 'fs/promises';
import * as path from 'path';
import yaml from 'js-yaml';
import { Config, ConfigFileSchema, fromFile, toFile } from './config';
import { InputMalformedError, PreconditionError, errorMsg } from './errors';
import { readLocalShareId } from './keyshare';
import { logger } from './logger';
import { createOrLoadSignState, isNotFound, shareSignStatePath, signStatePath } from './signstate';

export type Format = 'yaml' | 'json';

export const CONFIG_FILE = 'config.yaml';

export function encodeConfig(cfg: Config, format: Format = 'yaml'): string {
  const data = toFile(cfg);
  if (format === 'json') return JSON.stringify(data, null, 2) + '\n';
  return yaml.dump(data, { noRefs: true, lineWidth: -1 });
}

export function decodeConfig(text: string, format: Format = 'yaml', source = 'config'): Config {
  let data: unknown;
  try {
    data = format === 'json' ? JSON.parse(text) : yaml.load(text);
  } catch (e) {
    throw new InputMalformedError('malformed-file', `invalid ${format} in ${source}: ${errorMsg(e)}`);
  }
  const res = ConfigFileSchema.safeParse(data);
  if (!res.success) {
    let msg = `invalid configuration in ${source}\n`;
    res.error.issues.forEach((issue) => {
      msg += `  - ${issue.path.join('.')}: ${issue.message}\n`;
    });
    throw new InputMalformedError('malformed-file', msg.trimEnd());
  }
  return fromFile(res.data);
}

/** The home directory: config.yaml, state/ and, for cosigners, share.json. */
export class ConfigStore {
  constructor(public root: string) {}

  configPath() { return path.join(this.root, CONFIG_FILE); }
  stateDir() { return path.join(this.root, 'state'); }

  async assertUninitialized() {
    let entries: string[];
    try { entries = await fs.readdir(this.root); }
    catch (e) {
      if (isNotFound(e)) return;
      throw e;
    }
    if (entries.length > 0) {
      throw new PreconditionError(
        'home-not-empty',
        `${this.root} is not empty, check for existing configuration and clear path before trying again`,
      );
    }
  }

  async load(): Promise<Config> {
    let text: string;
    try { text = await fs.readFile(this.configPath(), 'utf8'); }
    catch (e) {
      if (!isNotFound(e)) throw e;
      throw new PreconditionError('config-missing', `no configuration at ${this.configPath()}, run "config init" first`);
    }
    return decodeConfig(text, 'yaml', this.configPath());
  }

  // tmp + rename so a crash never leaves a half-written config
  async save(cfg: Config) {
    await fs.mkdir(this.root, { recursive: true });
    const tmp = `${this.configPath()}.tmp`;
    await fs.writeFile(tmp, encodeConfig(cfg), { encoding: 'utf8', mode: 0o644 });
    await fs.rename(tmp, this.configPath());
    logger.debug(`wrote ${this.configPath()}`);
  }

  /** Writes the config and provisions zeroed sign state records. Returns the state file paths. */
  async initialize(cfg: Config): Promise<string[]> {
    await fs.mkdir(this.stateDir(), { recursive: true });
    await this.save(cfg);
    return this.provisionSignStates(cfg);
  }

  async provisionSignStates(cfg: Config): Promise<string[]> {
    const files = [signStatePath(this.root, cfg.chainId)];
    if (cfg.cosigner) files.push(shareSignStatePath(this.root, cfg.chainId));
    for (const f of files) {
      await createOrLoadSignState(f);
      logger.debug(`sign state ready at ${f}`);
    }
    return files;
  }

  localShareId(): Promise<number | undefined> {
    return readLocalShareId(this.root);
  }
}
