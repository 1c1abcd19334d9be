/**
 * goals: team goals.
 */

import type { Command } from 'commander';
import type { GoalResponse } from '@clickup-cli/core';
import type { CommandContext } from '../context.js';
import { parseTimestamp, type ContextFactory } from './shared.js';

function printGoal(ctx: CommandContext, result: GoalResponse): void {
  const { goal } = result;
  ctx.printer.record(result, [
    ['ID', goal.id],
    ['Name', goal.name],
    ['Due date', goal.due_date],
    ['Completed', goal.percent_completed === undefined ? undefined : `${goal.percent_completed}%`],
    ['Description', goal.description],
  ]);
}

export function registerGoals(program: Command, context: ContextFactory): void {
  const goals = program.command('goals').description('Goal operations');

  goals
    .command('list')
    .description('List goals in a team')
    .option('--team <id>', 'Team (workspace) ID')
    .option('--include-completed', 'Include completed goals')
    .action(async (options: { team?: string; includeCompleted?: boolean }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().goals.list(ctx.teamId(options.team), options.includeCompleted ?? false);
      ctx.printer.list(result, {
        headers: ['ID', 'NAME', 'PERCENT', 'DUE_DATE'],
        rows: result.goals.map((goal) => [goal.id, goal.name, goal.percent_completed, goal.due_date]),
        noun: 'goals',
      });
    });

  goals
    .command('get <goalId>')
    .description('Get a goal')
    .action(async (goalId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printGoal(ctx, await ctx.client().goals.get(goalId));
    });

  goals
    .command('create <name>')
    .description('Create a goal')
    .option('--team <id>', 'Team (workspace) ID')
    .option('--due <ms|now>', 'Due date as Unix milliseconds', parseTimestamp)
    .option('--description <text>', 'Goal description')
    .option('--color <hex>', 'Goal color')
    .action(
      async (
        name: string,
        options: { team?: string; due?: number; description?: string; color?: string },
        command: Command
      ) => {
        const ctx = context(command);
        const result = await ctx.client().goals.create(ctx.teamId(options.team), {
          name,
          due_date: options.due,
          description: options.description,
          color: options.color,
        });
        printGoal(ctx, result);
      }
    );

  goals
    .command('update <goalId>')
    .description('Update a goal')
    .option('--name <name>', 'New name')
    .option('--due <ms|now>', 'Due date as Unix milliseconds', parseTimestamp)
    .option('--description <text>', 'New description')
    .option('--color <hex>', 'New color')
    .action(
      async (
        goalId: string,
        options: { name?: string; due?: number; description?: string; color?: string },
        command: Command
      ) => {
        const ctx = context(command);
        const result = await ctx.client().goals.update(goalId, {
          name: options.name,
          due_date: options.due,
          description: options.description,
          color: options.color,
        });
        printGoal(ctx, result);
      }
    );

  goals
    .command('delete <goalId>')
    .description('Delete a goal')
    .action(async (goalId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete goal ${goalId}`);
      await ctx.client().goals.delete(goalId);
      ctx.printer.success(`Goal ${goalId} deleted`, { goal_id: goalId });
    });
}
