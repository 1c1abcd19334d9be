/**
 * spaces, folders and lists.
 */

import type { Command } from 'commander';
import type { Folder, List, Space } from '@clickup-cli/core';
import { UsageError } from '../errfmt.js';
import type { CommandContext } from '../context.js';
import { parseTimestamp, type ContextFactory } from './shared.js';

function printSpace(ctx: CommandContext, space: Space): void {
  ctx.printer.record(space, [
    ['ID', space.id],
    ['Name', space.name],
    ['Private', space.private],
    ['Archived', space.archived],
  ]);
}

function printFolder(ctx: CommandContext, folder: Folder): void {
  ctx.printer.record(folder, [
    ['ID', folder.id],
    ['Name', folder.name],
    ['Space', folder.space?.name ?? folder.space?.id],
    ['Tasks', folder.task_count],
    ['Lists', folder.lists?.length],
  ]);
}

function printList(ctx: CommandContext, list: List): void {
  ctx.printer.record(list, [
    ['ID', list.id],
    ['Name', list.name],
    ['Folder', list.folder?.name ?? list.folder?.id],
    ['Space', list.space?.name ?? list.space?.id],
    ['Tasks', list.task_count],
    ['Due date', list.due_date],
    ['Content', list.content],
  ]);
}

export function registerSpaces(program: Command, context: ContextFactory): void {
  const spaces = program.command('spaces').description('Space operations');

  spaces
    .command('list')
    .description('List spaces in a team')
    .option('--team <id>', 'Team (workspace) ID')
    .option('--archived', 'Include archived spaces')
    .action(async (options: { team?: string; archived?: boolean }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().spaces.list(ctx.teamId(options.team), options.archived ?? false);
      ctx.printer.list(result, {
        headers: ['ID', 'NAME', 'PRIVATE'],
        rows: result.spaces.map((space) => [space.id, space.name, space.private]),
        noun: 'spaces',
      });
    });

  spaces
    .command('get <spaceId>')
    .description('Get a space')
    .action(async (spaceId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printSpace(ctx, await ctx.client().spaces.get(spaceId));
    });

  spaces
    .command('create <name>')
    .description('Create a space')
    .option('--team <id>', 'Team (workspace) ID')
    .option('--multiple-assignees', 'Allow multiple assignees on tasks')
    .action(async (name: string, options: { team?: string; multipleAssignees?: boolean }, command: Command) => {
      const ctx = context(command);
      const space = await ctx.client().spaces.create(ctx.teamId(options.team), {
        name,
        multiple_assignees: options.multipleAssignees,
      });
      printSpace(ctx, space);
    });

  spaces
    .command('update <spaceId>')
    .description('Update a space')
    .option('--name <name>', 'New name')
    .option('--color <hex>', 'New color')
    .option('--private', 'Make the space private')
    .option('--public', 'Make the space public')
    .action(
      async (
        spaceId: string,
        options: { name?: string; color?: string; private?: boolean; public?: boolean },
        command: Command
      ) => {
        const ctx = context(command);
        if (options.private && options.public) {
          throw new UsageError('cannot combine --private and --public');
        }
        const visibility = options.private ? true : options.public ? false : undefined;
        const space = await ctx.client().spaces.update(spaceId, {
          name: options.name,
          color: options.color,
          private: visibility,
        });
        printSpace(ctx, space);
      }
    );

  spaces
    .command('delete <spaceId>')
    .description('Delete a space')
    .action(async (spaceId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete space ${spaceId}`);
      await ctx.client().spaces.delete(spaceId);
      ctx.printer.success(`Space ${spaceId} deleted`, { space_id: spaceId });
    });
}

export function registerFolders(program: Command, context: ContextFactory): void {
  const folders = program.command('folders').description('Folder operations');

  folders
    .command('list <spaceId>')
    .description('List folders in a space')
    .option('--archived', 'Include archived folders')
    .action(async (spaceId: string, options: { archived?: boolean }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().folders.list(spaceId, options.archived ?? false);
      ctx.printer.list(result, {
        headers: ['ID', 'NAME', 'LISTS', 'TASKS'],
        rows: result.folders.map((folder) => [folder.id, folder.name, folder.lists?.length, folder.task_count]),
        noun: 'folders',
      });
    });

  folders
    .command('get <folderId>')
    .description('Get a folder')
    .action(async (folderId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printFolder(ctx, await ctx.client().folders.get(folderId));
    });

  folders
    .command('create <spaceId> <name>')
    .description('Create a folder in a space')
    .action(async (spaceId: string, name: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printFolder(ctx, await ctx.client().folders.create(spaceId, { name }));
    });

  folders
    .command('update <folderId> <name>')
    .description('Rename a folder')
    .action(async (folderId: string, name: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printFolder(ctx, await ctx.client().folders.update(folderId, { name }));
    });

  folders
    .command('delete <folderId>')
    .description('Delete a folder')
    .action(async (folderId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete folder ${folderId}`);
      await ctx.client().folders.delete(folderId);
      ctx.printer.success(`Folder ${folderId} deleted`, { folder_id: folderId });
    });
}

interface ListLocation {
  folder?: string;
  space?: string;
}

function requireOneLocation(options: ListLocation): void {
  if ((options.folder === undefined) === (options.space === undefined)) {
    throw new UsageError('specify exactly one of --folder or --space');
  }
}

export function registerLists(program: Command, context: ContextFactory): void {
  const lists = program.command('lists').description('List operations');

  lists
    .command('list')
    .description('List the lists in a folder, or the folderless lists in a space')
    .option('--folder <id>', 'Folder ID')
    .option('--space <id>', 'Space ID (folderless lists)')
    .option('--archived', 'Include archived lists')
    .action(async (options: ListLocation & { archived?: boolean }, command: Command) => {
      const ctx = context(command);
      requireOneLocation(options);
      const archived = options.archived ?? false;
      const result =
        options.folder !== undefined
          ? await ctx.client().lists.listByFolder(options.folder, archived)
          : await ctx.client().lists.listFolderless(options.space ?? '', archived);
      ctx.printer.list(result, {
        headers: ['ID', 'NAME', 'TASKS'],
        rows: result.lists.map((list) => [list.id, list.name, list.task_count]),
        noun: 'lists',
      });
    });

  lists
    .command('get <listId>')
    .description('Get a list')
    .action(async (listId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printList(ctx, await ctx.client().lists.get(listId));
    });

  lists
    .command('create <name>')
    .description('Create a list in a folder, or a folderless list in a space')
    .option('--folder <id>', 'Folder ID')
    .option('--space <id>', 'Space ID (folderless list)')
    .option('--content <text>', 'List description')
    .option('--due <ms|now>', 'Due date as Unix milliseconds', parseTimestamp)
    .action(
      async (name: string, options: ListLocation & { content?: string; due?: number }, command: Command) => {
        const ctx = context(command);
        requireOneLocation(options);
        const request = { name, content: options.content, due_date: options.due };
        const list =
          options.folder !== undefined
            ? await ctx.client().lists.createInFolder(options.folder, request)
            : await ctx.client().lists.createFolderless(options.space ?? '', request);
        printList(ctx, list);
      }
    );

  lists
    .command('from-template <templateId>')
    .description('Create a list from a template in a folder, or folderless in a space')
    .option('--folder <id>', 'Folder ID')
    .option('--space <id>', 'Space ID (folderless list)')
    .requiredOption('--name <name>', 'Name for the new list')
    .action(async (templateId: string, options: ListLocation & { name: string }, command: Command) => {
      const ctx = context(command);
      requireOneLocation(options);
      const request = { name: options.name };
      const list =
        options.folder !== undefined
          ? await ctx.client().lists.createFromTemplateInFolder(options.folder, templateId, request)
          : await ctx.client().lists.createFromTemplateInSpace(options.space ?? '', templateId, request);
      printList(ctx, list);
    });

  lists
    .command('update <listId>')
    .description('Update a list')
    .option('--name <name>', 'New name')
    .option('--content <text>', 'New description')
    .option('--due <ms|now>', 'Due date as Unix milliseconds', parseTimestamp)
    .action(
      async (listId: string, options: { name?: string; content?: string; due?: number }, command: Command) => {
        const ctx = context(command);
        const list = await ctx.client().lists.update(listId, {
          name: options.name,
          content: options.content,
          due_date: options.due,
        });
        printList(ctx, list);
      }
    );

  lists
    .command('delete <listId>')
    .description('Delete a list')
    .action(async (listId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete list ${listId}`);
      await ctx.client().lists.delete(listId);
      ctx.printer.success(`List ${listId} deleted`, { list_id: listId });
    });

  lists
    .command('add-task <listId> <taskId>')
    .description('Add a task to an additional list')
    .action(async (listId: string, taskId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.client().lists.addTask(listId, taskId);
      ctx.printer.success(`Task ${taskId} added to list ${listId}`, { list_id: listId, task_id: taskId });
    });

  lists
    .command('remove-task <listId> <taskId>')
    .description('Remove a task from an additional list')
    .action(async (listId: string, taskId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`remove task ${taskId} from list ${listId}`);
      await ctx.client().lists.removeTask(listId, taskId);
      ctx.printer.success(`Task ${taskId} removed from list ${listId}`, { list_id: listId, task_id: taskId });
    });
}
