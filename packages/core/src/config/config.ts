/**
 * On-disk configuration: the per-user config directory and `config.json`.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { APP_NAME } from '../constants.js';

export interface CliConfig {
  team_id?: string;
  workspace_id?: string;
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

const CONFIG_FILE = 'config.json';

/**
 * Per-platform config directory. Does not create it.
 */
export function configDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', APP_NAME);
  }
  if (platform === 'win32') {
    return path.join(env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming'), APP_NAME);
  }
  return path.join(env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), APP_NAME);
}

export function ensureConfigDir(dir: string = configDir()): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  return dir;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function readConfig(dir: string = configDir()): CliConfig {
  const file = path.join(dir, CONFIG_FILE);
  if (!fs.existsSync(file)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`parse config file: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError('parse config file: expected a JSON object');
  }

  return {
    team_id: optionalString(parsed, 'team_id'),
    workspace_id: optionalString(parsed, 'workspace_id'),
  };
}

/**
 * Merge `update` into the stored config and write it back.
 */
export function writeConfig(update: CliConfig, dir: string = configDir()): CliConfig {
  ensureConfigDir(dir);
  const merged: CliConfig = { ...readConfig(dir) };
  if (update.team_id !== undefined) merged.team_id = update.team_id;
  if (update.workspace_id !== undefined) merged.workspace_id = update.workspace_id;

  fs.writeFileSync(path.join(dir, CONFIG_FILE), JSON.stringify(merged, null, 2) + '\n', { mode: 0o600 });
  return merged;
}
