/**
 * auth: credential and default-ID management, identity, OAuth helpers.
 */

import type { Command } from 'commander';
import { ENV, writeConfig } from '@clickup-cli/core';
import { UserFacingError } from '../errfmt.js';
import type { ContextFactory } from './shared.js';

function redact(key: string): string {
  return key.length > 8 ? `${key.slice(0, 4)}...${key.slice(-4)}` : '********';
}

export function registerAuth(program: Command, context: ContextFactory): void {
  const auth = program.command('auth').description('Auth and credentials');

  auth
    .command('set-key [key]')
    .description('Store the API key encrypted on disk (prompts, or reads stdin when piped)')
    .action(async (key: string | undefined, _options: unknown, command: Command) => {
      const ctx = context(command);

      let apiKey: string;
      if (key !== undefined) {
        ctx.printer.warn('Warning: passing keys as arguments exposes them in shell history. Pipe the key on stdin instead.');
        apiKey = key.trim();
      } else if (ctx.interactive) {
        apiKey = (await ctx.prompts.secret('ClickUp API key:')).trim();
      } else {
        apiKey = (await ctx.readStdin()).trim();
      }

      if (apiKey === '') {
        throw new UserFacingError('API key cannot be empty');
      }

      ctx.storage.save(apiKey);
      ctx.printer.success('API key saved', { path: ctx.storage.storagePath });
    });

  auth
    .command('status')
    .description('Show where the API key comes from')
    .action(async (_options: unknown, command: Command) => {
      const ctx = context(command);
      const envOverride = Boolean(ctx.env[ENV.apiKey]?.trim());
      const hasKey = ctx.storage.has();
      const stored = hasKey && !envOverride ? ctx.storage.load() : null;

      const status = {
        has_key: hasKey,
        env_override: envOverride,
        storage_path: ctx.storage.storagePath,
        key_redacted: stored ? redact(stored) : undefined,
      };

      let summary = 'Not authenticated';
      if (envOverride) summary = `Using ${ENV.apiKey} environment variable`;
      else if (hasKey) summary = 'Authenticated';

      ctx.printer.record(status, [
        ['Status', summary],
        ['Storage', status.storage_path],
        ['Key', status.key_redacted],
      ]);
    });

  auth
    .command('remove')
    .description('Delete the stored API key')
    .action(async (_options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive('remove the stored API key');

      if (!ctx.storage.clear()) {
        throw new UserFacingError('no stored API key to remove');
      }
      ctx.printer.success('API key removed');
    });

  auth
    .command('set-team <teamId>')
    .description('Set the default team (workspace) ID for v2 commands')
    .action(async (teamId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      const id = teamId.trim();
      if (id === '') {
        throw new UserFacingError('team ID cannot be empty');
      }
      writeConfig({ team_id: id }, ctx.configDir);
      ctx.printer.success(`Default team ID set to ${id}`, { team_id: id });
    });

  auth
    .command('set-workspace <workspaceId>')
    .description('Set the default workspace ID for v3 commands (chat, docs, attachments)')
    .action(async (workspaceId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      const id = workspaceId.trim();
      if (id === '') {
        throw new UserFacingError('workspace ID cannot be empty');
      }
      writeConfig({ workspace_id: id }, ctx.configDir);
      ctx.printer.success(`Default workspace ID set to ${id}`, { workspace_id: id });
    });

  auth
    .command('whoami')
    .description('Show the user the API key belongs to')
    .action(async (_options: unknown, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().auth.whoami();
      ctx.printer.record(result, [
        ['ID', result.user.id],
        ['Username', result.user.username],
        ['Email', result.user.email],
      ]);
    });

  auth
    .command('token')
    .description('Exchange an OAuth authorization code for an access token')
    .requiredOption('--client-id <id>', 'OAuth app client ID')
    .requiredOption('--client-secret <secret>', 'OAuth app client secret')
    .requiredOption('--code <code>', 'Authorization code from the redirect')
    .action(async (options: { clientId: string; clientSecret: string; code: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.publicClient().auth.token({
        client_id: options.clientId,
        client_secret: options.clientSecret,
        code: options.code,
      });
      ctx.printer.record(result, [['Access token', result.access_token]]);
    });

  auth
    .command('oauth-url')
    .description('Print the OAuth authorization URL')
    .requiredOption('--client-id <id>', 'OAuth app client ID')
    .requiredOption('--redirect-uri <uri>', 'Redirect URI registered for the app')
    .option('--open', 'Open the URL in the default browser')
    .action(async (options: { clientId: string; redirectUri: string; open?: boolean }, command: Command) => {
      const ctx = context(command);
      const url = ctx.publicClient().auth.authorizeUrl(options.clientId, options.redirectUri);
      ctx.printer.record({ url }, [['URL', url]]);

      if (options.open) {
        await ctx.openUrl(url);
        ctx.printer.note('Opened in browser');
      }
    });
}
