/**
 * Where the API key, team ID and workspace ID come from.
 * Priority for each: explicit flag → environment → stored value.
 */

import { ENV } from '../constants.js';
import { readConfig } from '../config/config.js';
import { ApiKeyStorage } from './apikey-storage.js';

export class MissingCredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MissingCredentialsError';
  }
}

export type ApiKeySource = 'env' | 'storage';

export interface ResolvedApiKey {
  apiKey: string;
  source: ApiKeySource;
}

export interface ResolveOptions {
  env?: NodeJS.ProcessEnv;
  configDir?: string;
}

export function resolveApiKey(storage: ApiKeyStorage, env: NodeJS.ProcessEnv = process.env): ResolvedApiKey {
  const fromEnv = env[ENV.apiKey]?.trim();
  if (fromEnv) {
    return { apiKey: fromEnv, source: 'env' };
  }

  const stored = storage.load();
  if (stored) {
    return { apiKey: stored, source: 'storage' };
  }

  throw new MissingCredentialsError('no credentials found; run: clickup-cli auth set-key');
}

export function resolveTeamId(flag: string | undefined, options: ResolveOptions = {}): string {
  const teamId = pick(flag, ENV.teamId, 'team_id', options);
  if (teamId === '') {
    throw new MissingCredentialsError('no team ID configured; run: clickup-cli auth set-team <TEAM_ID>');
  }
  return teamId;
}

/**
 * Empty when nothing is configured; v3 services then fail locally.
 */
export function resolveWorkspaceId(flag: string | undefined, options: ResolveOptions = {}): string {
  return pick(flag, ENV.workspaceId, 'workspace_id', options);
}

function pick(
  flag: string | undefined,
  envName: string,
  configKey: 'team_id' | 'workspace_id',
  options: ResolveOptions
): string {
  const fromFlag = flag?.trim();
  if (fromFlag) return fromFlag;

  const fromEnv = (options.env ?? process.env)[envName]?.trim();
  if (fromEnv) return fromEnv;

  return readConfig(options.configDir)[configKey]?.trim() ?? '';
}
