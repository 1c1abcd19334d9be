/**
 * workspaces and members.
 */

import type { Command } from 'commander';
import type { User } from '@clickup-cli/core';
import type { ContextFactory } from './shared.js';

function memberRows(members: User[]) {
  return members.map((user) => [user.id, user.username, user.email]);
}

export function registerWorkspaces(program: Command, context: ContextFactory): void {
  const workspaces = program.command('workspaces').description('Workspace operations');

  workspaces
    .command('list')
    .description('List workspaces the API key can access')
    .action(async (_options: unknown, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().workspaces.list();
      ctx.printer.list(result, {
        headers: ['ID', 'NAME', 'MEMBERS'],
        rows: result.teams.map((team) => [team.id, team.name, team.members?.length]),
        noun: 'workspaces',
      });
    });

  workspaces
    .command('plan')
    .description('Show the workspace plan')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (options: { team?: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().workspaces.plan(ctx.teamId(options.team));
      ctx.printer.record(result, [
        ['Plan ID', result.plan_id],
        ['Plan', result.plan_name],
      ]);
    });

  workspaces
    .command('seats')
    .description('Show seat usage')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (options: { team?: string }, command: Command) => {
      const ctx = context(command);
      const { members, guests } = await ctx.client().workspaces.seats(ctx.teamId(options.team));
      ctx.printer.record({ members, guests }, [
        ['Member seats used', members.filled_members_seats],
        ['Member seats total', members.total_member_seats],
        ['Guest seats used', guests.filled_guest_seats],
        ['Guest seats total', guests.total_guest_seats],
      ]);
    });

  const members = program.command('members').description('Member operations');

  members
    .command('task <taskId>')
    .description('List members who can access a task')
    .action(async (taskId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().members.listForTask(taskId);
      ctx.printer.list(result, { headers: ['ID', 'USERNAME', 'EMAIL'], rows: memberRows(result.members), noun: 'members' });
    });

  members
    .command('list')
    .description('List all members of the workspace')
    .option('--team <id>', 'Team (workspace) ID')
    .action(async (options: { team?: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().members.list(ctx.teamId(options.team));
      ctx.printer.list(result, {
        headers: ['ID', 'USERNAME', 'EMAIL'],
        rows: memberRows(result.map((member) => member.user)),
        noun: 'members',
      });
    });

  members
    .command('list-members <listId>')
    .description('List members who can access a list')
    .action(async (listId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().members.listForList(listId);
      ctx.printer.list(result, { headers: ['ID', 'USERNAME', 'EMAIL'], rows: memberRows(result.members), noun: 'members' });
    });
}
