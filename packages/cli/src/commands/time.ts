/**
 * time: time entries and the running timer.
 */

import type { Command } from 'commander';
import type { Tag, TimeEntryResponse, UpdateTimeEntryRequest } from '@clickup-cli/core';
import type { CommandContext } from '../context.js';
import { UsageError } from '../errfmt.js';
import { collectList, parsePositiveInteger, parseTimestamp, type ContextFactory } from './shared.js';

function tagsFrom(names: string[]): Tag[] {
  return names.map((name) => ({ name }));
}

function parseTagAction(value: string): 'add' | 'remove' {
  if (value === 'add' || value === 'remove') {
    return value;
  }
  throw new UsageError(`invalid tag action "${value}" (expected add or remove)`);
}

function printEntry(ctx: CommandContext, result: TimeEntryResponse, emptyMessage: string): void {
  const entry = result.data;
  if (!entry) {
    if (ctx.printer.mode === 'json') {
      ctx.printer.record(result, []);
    } else {
      ctx.printer.note(emptyMessage);
    }
    return;
  }

  ctx.printer.record(result, [
    ['ID', entry.id],
    ['Task', entry.task?.name ?? entry.task?.id],
    ['Start', entry.start],
    ['End', entry.end],
    ['Duration', entry.duration],
    ['Description', entry.description],
    ['Billable', entry.billable],
  ]);
}

export function registerTime(program: Command, context: ContextFactory): void {
  const time = program.command('time').description('Time tracking');

  time
    .command('list')
    .description('List time entries')
    .option('--team <id>', 'Team (workspace) ID')
    .option('--task <taskId>', 'Only entries for this task')
    .action(async (options: { team?: string; task?: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().time.list(ctx.teamId(options.team), options.task);
      ctx.printer.list(result, {
        headers: ['ID', 'TASK', 'START', 'DURATION', 'DESCRIPTION'],
        rows: result.data.map((entry) => [
          entry.id,
          entry.task?.id,
          entry.start,
          entry.duration,
          entry.description,
        ]),
        noun: 'time entries',
      });
    });

  time
    .command('log <taskId>')
    .argument('<durationMs>', 'Duration in milliseconds', parsePositiveInteger)
    .description('Log a finished time entry on a task')
    .option('--team <id>', 'Team (workspace) ID')
    .option('--start <ms|now>', 'Start time as Unix milliseconds (default: now)', parseTimestamp)
    .option('--description <text>', 'Entry description')
    .option('--billable', 'Mark as billable')
    .action(
      async (
        taskId: string,
        durationMs: number,
        options: { team?: string; start?: number; description?: string; billable?: boolean },
        command: Command
      ) => {
        const ctx = context(command);
        const result = await ctx.client().time.log(ctx.teamId(options.team), {
          tid: taskId,
          start: options.start ?? Date.now(),
          duration: durationMs,
          description: options.description,
          billable: options.billable,
        });
        printEntry(ctx, result, 'Time entry logged');
      }
    );

  time
    .command('get <entryId>')
    .description('Get a time entry')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (entryId: string, options: { team?: string }, command: Command) => {
      const ctx = context(command);
      printEntry(ctx, await ctx.client().time.get(ctx.teamId(options.team), entryId), 'Time entry not found');
    });

  time
    .command('current')
    .description('Show the running timer')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (options: { team?: string }, command: Command) => {
      const ctx = context(command);
      printEntry(ctx, await ctx.client().time.current(ctx.teamId(options.team)), 'No timer running');
    });

  time
    .command('start')
    .description('Start a timer')
    .option('--team <id>', 'Team (workspace) ID')
    .option('--task <taskId>', 'Task to track time against')
    .option('--description <text>', 'Entry description')
    .option('--billable', 'Mark as billable')
    .action(
      async (
        options: { team?: string; task?: string; description?: string; billable?: boolean },
        command: Command
      ) => {
        const ctx = context(command);
        const result = await ctx.client().time.start(ctx.teamId(options.team), {
          tid: options.task,
          description: options.description,
          billable: options.billable,
        });
        printEntry(ctx, result, 'Timer started');
      }
    );

  time
    .command('stop')
    .description('Stop the running timer')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (options: { team?: string }, command: Command) => {
      const ctx = context(command);
      printEntry(ctx, await ctx.client().time.stop(ctx.teamId(options.team)), 'No timer running');
    });

  time
    .command('delete <entryId>')
    .description('Delete a time entry')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (entryId: string, options: { team?: string }, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete time entry ${entryId}`);
      await ctx.client().time.delete(ctx.teamId(options.team), entryId);
      ctx.printer.success(`Time entry ${entryId} deleted`, { entry_id: entryId });
    });

  time
    .command('update <entryId>')
    .description('Update a time entry')
    .option('--team <id>', 'Team (workspace) ID')
    .option('--description <text>', 'New description')
    .option('--duration <ms>', 'New duration in milliseconds', parsePositiveInteger)
    .option('--start <ms|now>', 'New start time as Unix milliseconds', parseTimestamp)
    .option('--end <ms|now>', 'New end time as Unix milliseconds', parseTimestamp)
    .option('--billable', 'Mark as billable')
    .option('--no-billable', 'Mark as not billable')
    .option('--tags <names>', 'Comma-separated tag names', collectList)
    .option('--tag-action <action>', 'What to do with --tags: add or remove', parseTagAction)
    .action(
      async (
        entryId: string,
        options: {
          team?: string;
          description?: string;
          duration?: number;
          start?: number;
          end?: number;
          billable?: boolean;
          tags?: string[];
          tagAction?: 'add' | 'remove';
        },
        command: Command
      ) => {
        const ctx = context(command);
        if (options.tagAction !== undefined && options.tags === undefined) {
          throw new UsageError('--tag-action needs --tags');
        }

        const request: UpdateTimeEntryRequest = {
          description: options.description,
          duration: options.duration,
          start: options.start,
          end: options.end,
          billable: options.billable,
        };
        if (options.tags !== undefined) {
          request.tags = tagsFrom(options.tags);
          request.tag_action = options.tagAction ?? 'add';
        }

        const result = await ctx.client().time.update(ctx.teamId(options.team), entryId, request);
        printEntry(ctx, result, `Time entry ${entryId} updated`);
      }
    );

  time
    .command('history <entryId>')
    .description('Show the change history of a time entry')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (entryId: string, options: { team?: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().time.history(ctx.teamId(options.team), entryId);
      ctx.printer.list(result, {
        headers: ['ID', 'FIELD', 'BEFORE', 'AFTER', 'DATE', 'USER'],
        rows: result.data.map((change) => [
          change.id,
          change.field,
          JSON.stringify(change.before),
          JSON.stringify(change.after),
          change.date,
          change.user?.username,
        ]),
        noun: 'changes',
      });
    });

  time
    .command('tags')
    .description('List every tag used on time entries')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (options: { team?: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().time.listTags(ctx.teamId(options.team));
      ctx.printer.list(result, {
        headers: ['NAME', 'FG', 'BG'],
        rows: result.data.map((tag) => [tag.name, tag.tag_fg, tag.tag_bg]),
        noun: 'tags',
      });
    });

  time
    .command('add-tags')
    .description('Add tags to time entries')
    .option('--team <id>', 'Team (workspace) ID')
    .requiredOption('--entry-ids <ids>', 'Comma-separated time entry IDs', collectList)
    .requiredOption('--tags <names>', 'Comma-separated tag names', collectList)
    .action(async (options: { team?: string; entryIds: string[]; tags: string[] }, command: Command) => {
      const ctx = context(command);
      await ctx.client().time.addTags(ctx.teamId(options.team), {
        time_entry_ids: options.entryIds,
        tags: tagsFrom(options.tags),
      });
      ctx.printer.success(`Added ${options.tags.length} tag(s) to ${options.entryIds.length} time entries`, {
        time_entry_ids: options.entryIds.join(','),
        tags: options.tags.join(','),
      });
    });

  time
    .command('remove-tags')
    .description('Remove tags from time entries')
    .option('--team <id>', 'Team (workspace) ID')
    .requiredOption('--entry-ids <ids>', 'Comma-separated time entry IDs', collectList)
    .requiredOption('--tags <names>', 'Comma-separated tag names', collectList)
    .action(async (options: { team?: string; entryIds: string[]; tags: string[] }, command: Command) => {
      const ctx = context(command);
      await ctx.client().time.removeTags(ctx.teamId(options.team), {
        time_entry_ids: options.entryIds,
        tags: tagsFrom(options.tags),
      });
      ctx.printer.success(`Removed ${options.tags.length} tag(s) from ${options.entryIds.length} time entries`, {
        time_entry_ids: options.entryIds.join(','),
        tags: options.tags.join(','),
      });
    });

  time
    .command('rename-tag')
    .description('Rename a time entry tag everywhere it is used')
    .option('--team <id>', 'Team (workspace) ID')
    .requiredOption('--old-name <name>', 'Current tag name')
    .requiredOption('--new-name <name>', 'New tag name')
    .action(async (options: { team?: string; oldName: string; newName: string }, command: Command) => {
      const ctx = context(command);
      await ctx.client().time.renameTag(ctx.teamId(options.team), {
        name: options.oldName,
        new_name: options.newName,
      });
      ctx.printer.success(`Renamed tag "${options.oldName}" to "${options.newName}"`, {
        name: options.oldName,
        new_name: options.newName,
      });
    });
}
