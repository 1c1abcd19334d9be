/**
 * tags: space tags and task tagging.
 */

import type { Command } from 'commander';
import type { ContextFactory } from './shared.js';

export function registerTags(program: Command, context: ContextFactory): void {
  const tags = program.command('tags').description('Tag operations');

  tags
    .command('list <spaceId>')
    .description('List tags in a space')
    .action(async (spaceId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().tags.list(spaceId);
      ctx.printer.list(result, {
        headers: ['NAME', 'FOREGROUND', 'BACKGROUND'],
        rows: result.tags.map((tag) => [tag.name, tag.tag_fg, tag.tag_bg]),
        noun: 'tags',
      });
    });

  tags
    .command('create <spaceId> <name>')
    .description('Create a tag in a space')
    .option('--fg <hex>', 'Foreground color')
    .option('--bg <hex>', 'Background color')
    .action(async (spaceId: string, name: string, options: { fg?: string; bg?: string }, command: Command) => {
      const ctx = context(command);
      await ctx.client().tags.create(spaceId, { name, tag_fg: options.fg, tag_bg: options.bg });
      ctx.printer.success(`Tag "${name}" created`, { space_id: spaceId, tag: name });
    });

  tags
    .command('delete <spaceId> <name>')
    .description('Delete a tag from a space')
    .action(async (spaceId: string, name: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete tag "${name}"`);
      await ctx.client().tags.delete(spaceId, name);
      ctx.printer.success(`Tag "${name}" deleted`, { space_id: spaceId, tag: name });
    });

  tags
    .command('add <taskId> <name>')
    .description('Tag a task')
    .action(async (taskId: string, name: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.client().tags.addToTask(taskId, name);
      ctx.printer.success(`Tag "${name}" added to task ${taskId}`, { task_id: taskId, tag: name });
    });

  tags
    .command('remove <taskId> <name>')
    .description('Remove a tag from a task')
    .action(async (taskId: string, name: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`remove tag "${name}" from task ${taskId}`);
      await ctx.client().tags.removeFromTask(taskId, name);
      ctx.printer.success(`Tag "${name}" removed from task ${taskId}`, { task_id: taskId, tag: name });
    });
}
