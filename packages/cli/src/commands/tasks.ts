/**
 * tasks: CRUD, search, time in status, templates, merge and move.
 */

import type { Command } from 'commander';
import type { Task, TasksResponse } from '@clickup-cli/core';
import type { CommandContext } from '../context.js';
import {
  collectIntegers,
  collectList,
  joinNames,
  parseInteger,
  parseTimestamp,
  type ContextFactory,
} from './shared.js';

const PRIORITY_HELP = 'Priority (1=urgent, 2=high, 3=normal, 4=low)';

function printTasks(ctx: CommandContext, result: TasksResponse): void {
  ctx.printer.list(result, {
    headers: ['ID', 'NAME', 'STATUS', 'PRIORITY', 'URL'],
    rows: result.tasks.map((task) => [task.id, task.name, task.status.status, task.priority?.priority, task.url]),
    noun: 'tasks',
  });
}

function printTask(ctx: CommandContext, task: Task): void {
  ctx.printer.record(task, [
    ['ID', task.id],
    ['Name', task.name],
    ['Status', task.status.status],
    ['Priority', task.priority?.priority],
    ['Due date', task.due_date],
    ['Assignees', joinNames(task.assignees)],
    ['List', task.list?.name ?? task.list?.id],
    ['URL', task.url],
    ['Description', task.description],
  ]);
}

interface TaskFieldOptions {
  description?: string;
  status?: string;
  priority?: number;
  due?: number;
}

export function registerTasks(program: Command, context: ContextFactory): void {
  const tasks = program.command('tasks').description('Task operations');

  tasks
    .command('list <listId>')
    .description('List tasks in a list')
    .option('--status <status>', 'Filter by status')
    .option('--assignee <id>', 'Filter by assignee user ID')
    .option('--page <n>', 'Page number, starting at 0', parseInteger)
    .option('--no-closed', 'Leave out closed tasks')
    .action(
      async (
        listId: string,
        options: { status?: string; assignee?: string; page?: number; closed: boolean },
        command: Command
      ) => {
        const ctx = context(command);
        const result = await ctx.client().tasks.list(listId, {
          status: options.status,
          assignee: options.assignee,
          page: options.page,
          includeClosed: options.closed,
        });
        printTasks(ctx, result);
      }
    );

  tasks
    .command('get <taskId>')
    .description('Get a task')
    .action(async (taskId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printTask(ctx, await ctx.client().tasks.get(taskId));
    });

  tasks
    .command('create <listId> <name>')
    .description('Create a task in a list')
    .option('--description <text>', 'Task description')
    .option('--status <status>', 'Initial status')
    .option('--priority <n>', PRIORITY_HELP, parseInteger)
    .option('--due <ms|now>', 'Due date as Unix milliseconds', parseTimestamp)
    .option('--assignee <ids>', 'Assignee user IDs (comma-separated or repeated)', collectIntegers)
    .option('--tag <names>', 'Tag names (comma-separated or repeated)', collectList)
    .option('--parent <taskId>', 'Create as a subtask of this task')
    .action(
      async (
        listId: string,
        name: string,
        options: TaskFieldOptions & { assignee?: number[]; tag?: string[]; parent?: string },
        command: Command
      ) => {
        const ctx = context(command);
        const task = await ctx.client().tasks.create(listId, {
          name,
          description: options.description,
          status: options.status,
          priority: options.priority,
          due_date: options.due,
          assignees: options.assignee,
          tags: options.tag,
          parent: options.parent,
        });
        printTask(ctx, task);
      }
    );

  tasks
    .command('update <taskId>')
    .description('Update a task')
    .option('--name <name>', 'New name')
    .option('--description <text>', 'New description')
    .option('--status <status>', 'New status')
    .option('--priority <n>', PRIORITY_HELP, parseInteger)
    .option('--due <ms|now>', 'Due date as Unix milliseconds', parseTimestamp)
    .option('--add-assignee <ids>', 'User IDs to assign', collectIntegers)
    .option('--remove-assignee <ids>', 'User IDs to unassign', collectIntegers)
    .action(
      async (
        taskId: string,
        options: TaskFieldOptions & { name?: string; addAssignee?: number[]; removeAssignee?: number[] },
        command: Command
      ) => {
        const ctx = context(command);
        const assignees =
          options.addAssignee || options.removeAssignee
            ? { add: options.addAssignee, rem: options.removeAssignee }
            : undefined;
        const task = await ctx.client().tasks.update(taskId, {
          name: options.name,
          description: options.description,
          status: options.status,
          priority: options.priority,
          due_date: options.due,
          assignees,
        });
        printTask(ctx, task);
      }
    );

  tasks
    .command('delete <taskId>')
    .description('Delete a task')
    .action(async (taskId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete task ${taskId}`);
      await ctx.client().tasks.delete(taskId);
      ctx.printer.success(`Task ${taskId} deleted`, { task_id: taskId });
    });

  tasks
    .command('search')
    .description('Search tasks across a team')
    .option('--team <id>', 'Team (workspace) ID')
    .option('--status <statuses>', 'Statuses (comma-separated or repeated)', collectList)
    .option('--assignee <ids>', 'Assignee user IDs (comma-separated or repeated)', collectIntegers)
    .option('--tag <names>', 'Tag names (comma-separated or repeated)', collectList)
    .option('--order-by <field>', 'id, created, updated or due_date')
    .option('--reverse', 'Reverse the order')
    .option('--subtasks', 'Include subtasks')
    .option('--include-closed', 'Include closed tasks')
    .option('--due-after <ms>', 'Due date greater than (Unix milliseconds)', parseInteger)
    .option('--due-before <ms>', 'Due date less than (Unix milliseconds)', parseInteger)
    .option('--page <n>', 'Page number, starting at 0', parseInteger)
    .action(
      async (
        options: {
          team?: string;
          status?: string[];
          assignee?: number[];
          tag?: string[];
          orderBy?: string;
          reverse?: boolean;
          subtasks?: boolean;
          includeClosed?: boolean;
          dueAfter?: number;
          dueBefore?: number;
          page?: number;
        },
        command: Command
      ) => {
        const ctx = context(command);
        const result = await ctx.client().tasks.search(ctx.teamId(options.team), {
          statuses: options.status,
          assignees: options.assignee,
          tags: options.tag,
          orderBy: options.orderBy,
          reverse: options.reverse,
          subtasks: options.subtasks,
          includeClosed: options.includeClosed,
          dueDateGt: options.dueAfter,
          dueDateLt: options.dueBefore,
          page: options.page,
        });
        printTasks(ctx, result);
      }
    );

  tasks
    .command('time-in-status <taskId>')
    .description('Show how long a task has spent in each status')
    .action(async (taskId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().tasks.timeInStatus(taskId);
      ctx.printer.list(result, {
        headers: ['STATUS', 'MINUTES', 'SINCE'],
        rows: result.status_history.map((entry) => [entry.status, entry.total_time.by_minute, entry.total_time.since]),
        noun: 'statuses',
      });
    });

  tasks
    .command('bulk-time-in-status <taskIds...>')
    .description('Show the current status and time in it for several tasks')
    .action(async (taskIds: string[], _options: unknown, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().tasks.bulkTimeInStatus(taskIds);
      ctx.printer.list(result, {
        headers: ['TASK_ID', 'STATUS', 'MINUTES', 'SINCE'],
        rows: Object.entries(result).map(([taskId, entry]) => [
          taskId,
          entry.current_status.status,
          entry.current_status.total_time.by_minute,
          entry.current_status.total_time.since,
        ]),
        noun: 'tasks',
      });
    });

  tasks
    .command('from-template <listId> <templateId>')
    .description('Create a task in a list from a task template')
    .option('--name <name>', 'Override the template task name')
    .action(
      async (listId: string, templateId: string, options: { name?: string }, command: Command) => {
        const ctx = context(command);
        printTask(ctx, await ctx.client().tasks.createFromTemplate(listId, templateId, options.name));
      }
    );

  tasks
    .command('merge <targetTaskId> <sourceTaskIds...>')
    .description('Merge source tasks into the target task')
    .action(async (targetTaskId: string, sourceTaskIds: string[], _options: unknown, command: Command) => {
      const ctx = context(command);
      printTask(ctx, await ctx.client().tasks.merge(targetTaskId, sourceTaskIds));
    });

  tasks
    .command('move <taskId> <listId>')
    .description('Move a task to a different home list (needs a workspace ID)')
    .action(async (taskId: string, listId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.client().tasks.move(taskId, listId);
      ctx.printer.success(`Task ${taskId} moved to list ${listId}`, { task_id: taskId, list_id: listId });
    });
}
