/**
 * groups and roles: user groups and custom roles.
 */

import type { Command } from 'commander';
import type { UserGroup } from '@clickup-cli/core';
import type { CommandContext } from '../context.js';
import { collectIntegers, joinNames, type ContextFactory } from './shared.js';

function printGroup(ctx: CommandContext, group: UserGroup): void {
  ctx.printer.record(group, [
    ['ID', group.id],
    ['Name', group.name],
    ['Handle', group.handle],
    ['Members', joinNames(group.members)],
  ]);
}

export function registerGroups(program: Command, context: ContextFactory): void {
  const groups = program.command('groups').description('User group operations');

  groups
    .command('list')
    .description('List user groups')
    .action(async (_options: unknown, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().groups.list();
      ctx.printer.list(result, {
        headers: ['ID', 'NAME', 'MEMBER_COUNT'],
        rows: result.groups.map((group) => [group.id, group.name, group.members.length]),
        noun: 'groups',
      });
    });

  groups
    .command('create <name>')
    .description('Create a user group')
    .option('--team <id>', 'Team (workspace) ID')
    .option('--members <userIds>', 'Comma-separated user IDs to add', collectIntegers)
    .action(async (name: string, options: { team?: string; members?: number[] }, command: Command) => {
      const ctx = context(command);
      const group = await ctx.client().groups.create(ctx.teamId(options.team), { name, members: options.members });
      printGroup(ctx, group);
    });

  groups
    .command('update <groupId>')
    .description('Rename a user group or change its members')
    .option('--name <name>', 'New name')
    .option('--add-members <userIds>', 'Comma-separated user IDs to add', collectIntegers)
    .option('--remove-members <userIds>', 'Comma-separated user IDs to remove', collectIntegers)
    .action(
      async (
        groupId: string,
        options: { name?: string; addMembers?: number[]; removeMembers?: number[] },
        command: Command
      ) => {
        const ctx = context(command);
        const changesMembers = options.addMembers !== undefined || options.removeMembers !== undefined;
        const group = await ctx.client().groups.update(groupId, {
          name: options.name,
          members: changesMembers ? { add: options.addMembers, rem: options.removeMembers } : undefined,
        });
        printGroup(ctx, group);
      }
    );

  groups
    .command('delete <groupId>')
    .description('Delete a user group')
    .action(async (groupId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete user group ${groupId}`);
      await ctx.client().groups.delete(groupId);
      ctx.printer.success(`User group ${groupId} deleted`, { group_id: groupId });
    });
}

export function registerRoles(program: Command, context: ContextFactory): void {
  const roles = program.command('roles').description('Custom role operations');

  roles
    .command('list')
    .description('List custom roles in a workspace')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (options: { team?: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().roles.list(ctx.teamId(options.team));
      ctx.printer.list(result, {
        headers: ['ID', 'NAME', 'PERMISSIONS'],
        rows: result.custom_roles.map((role) => [role.id, role.name, role.permissions?.length ?? 0]),
        noun: 'roles',
      });
    });
}
