/**
 * webhooks: team webhook subscriptions.
 */

import type { Command } from 'commander';
import type { UpdateWebhookRequest, Webhook } from '@clickup-cli/core';
import { UsageError } from '../errfmt.js';
import type { CommandContext } from '../context.js';
import { collectList, parseInteger, type ContextFactory } from './shared.js';

function printWebhook(ctx: CommandContext, value: unknown, webhook: Webhook): void {
  ctx.printer.record(value, [
    ['ID', webhook.id],
    ['Endpoint', webhook.endpoint],
    ['Events', webhook.events.join(', ')],
    ['Status', webhook.health?.status],
    ['Secret', webhook.secret],
  ]);
}

function parseStatus(value: string | undefined): UpdateWebhookRequest['status'] {
  if (value === undefined) return undefined;
  if (value === 'active' || value === 'inactive') return value;
  throw new UsageError(`invalid status "${value}" (expected active or inactive)`);
}

export function registerWebhooks(program: Command, context: ContextFactory): void {
  const webhooks = program.command('webhooks').description('Webhook operations');

  webhooks
    .command('list')
    .description('List webhooks in a team')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (options: { team?: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().webhooks.list(ctx.teamId(options.team));
      ctx.printer.list(result, {
        headers: ['ID', 'ENDPOINT', 'EVENTS', 'STATUS'],
        rows: result.webhooks.map((hook) => [hook.id, hook.endpoint, hook.events.join(','), hook.health?.status]),
        noun: 'webhooks',
      });
    });

  webhooks
    .command('create <endpoint>')
    .description('Subscribe an endpoint to events')
    .requiredOption('--event <names>', 'Event names, or * for all (comma-separated or repeated)', collectList)
    .option('--team <id>', 'Team (workspace) ID')
    .option('--space <id>', 'Limit to a space', parseInteger)
    .option('--folder <id>', 'Limit to a folder', parseInteger)
    .option('--list <id>', 'Limit to a list', parseInteger)
    .option('--task <id>', 'Limit to a task')
    .action(
      async (
        endpoint: string,
        options: { event: string[]; team?: string; space?: number; folder?: number; list?: number; task?: string },
        command: Command
      ) => {
        const ctx = context(command);
        const result = await ctx.client().webhooks.create(ctx.teamId(options.team), {
          endpoint,
          events: options.event,
          space_id: options.space,
          folder_id: options.folder,
          list_id: options.list,
          task_id: options.task,
        });
        printWebhook(ctx, result, result.webhook);
      }
    );

  webhooks
    .command('update <webhookId>')
    .description('Change a webhook endpoint, events or status')
    .option('--endpoint <url>', 'New endpoint URL')
    .option('--event <names>', 'Replacement event names (comma-separated or repeated)', collectList)
    .option('--status <status>', 'active or inactive')
    .action(
      async (
        webhookId: string,
        options: { endpoint?: string; event?: string[]; status?: string },
        command: Command
      ) => {
        const ctx = context(command);
        const status = parseStatus(options.status);
        const result = await ctx.client().webhooks.update(webhookId, {
          endpoint: options.endpoint,
          events: options.event,
          status,
        });
        printWebhook(ctx, result, result.webhook);
      }
    );

  webhooks
    .command('delete <webhookId>')
    .description('Delete a webhook')
    .action(async (webhookId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete webhook ${webhookId}`);
      await ctx.client().webhooks.delete(webhookId);
      ctx.printer.success(`Webhook ${webhookId} deleted`, { webhook_id: webhookId });
    });
}
