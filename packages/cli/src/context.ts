/**
 * Per-invocation state shared by every command handler: global flags,
 * output printer, logger and the lazily built ClickUp client.
 */

import * as path from 'node:path';
import type { OptionValues } from 'commander';
import {
  ApiKeyStorage,
  DebugLogger,
  configDir as defaultConfigDir,
  createClickUpClient,
  resolveApiKey,
  resolveTeamId,
  resolveWorkspaceId,
  withFetch,
  withRequestLogging,
  type ClickUpClient,
  type FetchLike,
} from '@clickup-cli/core';
import { UserFacingError } from './errfmt.js';
import { modeFromFlags, type Writable } from './output/outfmt.js';
import { Printer } from './output/printer.js';
import type { Prompts } from './ui/prompts.js';

export type InputStream = AsyncIterable<Buffer | string> & { isTTY?: boolean };

export interface CliIo {
  stdout: Writable;
  stderr: Writable;
  stdin: InputStream;
}

export interface CliDependencies {
  io: CliIo;
  env: NodeJS.ProcessEnv;
  prompts: Prompts;
  openUrl: (url: string) => Promise<unknown>;
  /** Defaults to the global fetch. */
  fetch?: FetchLike;
  /** Defaults to the per-platform config directory. */
  configDir?: string;
}

export interface GlobalOptions {
  json: boolean;
  plain: boolean;
  verbose: boolean;
  debugLog: boolean;
  workspace?: string;
  input: boolean;
  force: boolean;
}

function flag(values: OptionValues, name: string, fallback: boolean = false): boolean {
  const value = values[name];
  return typeof value === 'boolean' ? value : fallback;
}

export function readGlobalOptions(values: OptionValues): GlobalOptions {
  const workspace = values.workspace;
  return {
    json: flag(values, 'json'),
    plain: flag(values, 'plain'),
    verbose: flag(values, 'verbose'),
    debugLog: flag(values, 'debugLog'),
    workspace: typeof workspace === 'string' ? workspace : undefined,
    input: flag(values, 'input', true),
    force: flag(values, 'force'),
  };
}

const defaultFetch: FetchLike = (input, init) => fetch(input, init);

export class CommandContext {
  readonly printer: Printer;
  readonly logger: DebugLogger;
  readonly configDir: string;
  readonly storage: ApiKeyStorage;

  private clickup?: ClickUpClient;

  constructor(
    private deps: CliDependencies,
    readonly options: GlobalOptions
  ) {
    const mode = modeFromFlags(options.json, options.plain);
    this.configDir = deps.configDir ?? defaultConfigDir(deps.env);
    this.logger = new DebugLogger({
      level: options.verbose ? 'debug' : 'warn',
      logDir: options.debugLog ? path.join(this.configDir, 'log') : undefined,
      sink: deps.io.stderr,
    });
    this.printer = new Printer(mode, deps.io.stdout, deps.io.stderr);
    this.storage = new ApiKeyStorage(path.join(this.configDir, 'apikey.enc'));
  }

  get env(): NodeJS.ProcessEnv {
    return this.deps.env;
  }

  get prompts(): Prompts {
    return this.deps.prompts;
  }

  /** Prompts are allowed: stdin is a terminal and --no-input is not set. */
  get interactive(): boolean {
    return this.options.input && this.deps.io.stdin.isTTY === true;
  }

  client(): ClickUpClient {
    if (!this.clickup) {
      const { apiKey, source } = resolveApiKey(this.storage, this.deps.env);
      const workspaceId = resolveWorkspaceId(this.options.workspace, {
        env: this.deps.env,
        configDir: this.configDir,
      });
      this.logger.debug(`API key from ${source}, workspace ${workspaceId || '(none)'}`);

      const fetchImpl = withRequestLogging(this.deps.fetch ?? defaultFetch, this.logger);
      this.clickup = createClickUpClient(apiKey, { workspaceId }, withFetch(fetchImpl));
    }
    return this.clickup;
  }

  /**
   * Client without a credential, for the OAuth endpoints.
   */
  publicClient(): ClickUpClient {
    const fetchImpl = withRequestLogging(this.deps.fetch ?? defaultFetch, this.logger);
    return createClickUpClient('', {}, withFetch(fetchImpl));
  }

  teamId(flagValue?: string): string {
    return resolveTeamId(flagValue, { env: this.deps.env, configDir: this.configDir });
  }

  openUrl(url: string): Promise<unknown> {
    return this.deps.openUrl(url);
  }

  /**
   * Gate for destructive commands: --force skips it, non-interactive runs
   * must pass --force, everyone else is asked.
   */
  async confirmDestructive(action: string): Promise<void> {
    if (this.options.force) {
      return;
    }
    if (!this.interactive) {
      throw new UserFacingError(`refusing to ${action} without --force (non-interactive)`);
    }
    if (!(await this.deps.prompts.confirm(`Really ${action}?`))) {
      throw new UserFacingError('cancelled');
    }
  }

  async readStdin(): Promise<string> {
    const chunks: string[] = [];
    for await (const chunk of this.deps.io.stdin) {
      chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
    }
    return chunks.join('');
  }
}
