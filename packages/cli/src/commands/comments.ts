/**
 * comments: task, list and view comments, threaded replies and post subtypes.
 */

import type { Command } from 'commander';
import type { CommentsResponse, CreateCommentResponse } from '@clickup-cli/core';
import type { CommandContext } from '../context.js';
import { parseInteger, type ContextFactory } from './shared.js';

function printComments(ctx: CommandContext, result: CommentsResponse, noun: string): void {
  ctx.printer.list(result, {
    headers: ['ID', 'USER', 'DATE', 'TEXT'],
    rows: result.comments.map((comment) => [comment.id, comment.user.username, comment.date, comment.comment_text]),
    noun,
  });
}

function printCreated(ctx: CommandContext, result: CreateCommentResponse): void {
  ctx.printer.record(result, [
    ['ID', result.id],
    ['Date', result.date],
  ]);
}

export function registerComments(program: Command, context: ContextFactory): void {
  const comments = program.command('comments').description('Comment operations');

  comments
    .command('list <taskId>')
    .description('List comments on a task')
    .action(async (taskId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printComments(ctx, await ctx.client().comments.list(taskId), 'comments');
    });

  comments
    .command('add <taskId> <text>')
    .description('Comment on a task')
    .option('--notify-all', 'Notify everyone on the task')
    .option('--assignee <userId>', 'Assign the comment to a user', parseInteger)
    .action(
      async (taskId: string, text: string, options: { notifyAll?: boolean; assignee?: number }, command: Command) => {
        const ctx = context(command);
        const result = await ctx.client().comments.add(taskId, {
          comment_text: text,
          notify_all: options.notifyAll,
          assignee: options.assignee,
        });
        printCreated(ctx, result);
      }
    );

  comments
    .command('update <commentId> <text>')
    .description('Edit a comment')
    .option('--resolve', 'Mark the comment resolved')
    .option('--unresolve', 'Mark the comment unresolved')
    .action(
      async (
        commentId: string,
        text: string,
        options: { resolve?: boolean; unresolve?: boolean },
        command: Command
      ) => {
        const ctx = context(command);
        const resolved = options.resolve ? true : options.unresolve ? false : undefined;
        await ctx.client().comments.update(commentId, { comment_text: text, resolved });
        ctx.printer.success(`Comment ${commentId} updated`, { comment_id: commentId });
      }
    );

  comments
    .command('delete <commentId>')
    .description('Delete a comment')
    .action(async (commentId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete comment ${commentId}`);
      await ctx.client().comments.delete(commentId);
      ctx.printer.success(`Comment ${commentId} deleted`, { comment_id: commentId });
    });

  comments
    .command('replies <commentId>')
    .description('List replies to a comment')
    .action(async (commentId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printComments(ctx, await ctx.client().comments.replies(commentId), 'replies');
    });

  comments
    .command('reply <commentId> <text>')
    .description('Reply to a comment')
    .action(async (commentId: string, text: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printCreated(ctx, await ctx.client().comments.reply(commentId, { comment_text: text }));
    });

  comments
    .command('list-comments <listId>')
    .description('List comments on a list')
    .action(async (listId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printComments(ctx, await ctx.client().comments.listComments(listId), 'comments');
    });

  comments
    .command('add-list <listId> <text>')
    .description('Comment on a list')
    .option('--notify-all', 'Notify everyone on the list')
    .option('--assignee <userId>', 'Assign the comment to a user', parseInteger)
    .action(
      async (listId: string, text: string, options: { notifyAll?: boolean; assignee?: number }, command: Command) => {
        const ctx = context(command);
        const result = await ctx.client().comments.addList(listId, {
          comment_text: text,
          notify_all: options.notifyAll,
          assignee: options.assignee,
        });
        printCreated(ctx, result);
      }
    );

  comments
    .command('view-comments <viewId>')
    .description('List comments on a view')
    .option('--start <ms>', 'Page from this comment date (Unix milliseconds)', parseInteger)
    .option('--start-id <commentId>', 'Page from this comment ID')
    .action(async (viewId: string, options: { start?: number; startId?: string }, command: Command) => {
      const ctx = context(command);
      printComments(ctx, await ctx.client().comments.viewComments(viewId, options), 'comments');
    });

  comments
    .command('add-view <viewId> <text>')
    .description('Comment on a view')
    .option('--notify-all', 'Notify everyone on the view')
    .option('--assignee <userId>', 'Assign the comment to a user', parseInteger)
    .action(
      async (viewId: string, text: string, options: { notifyAll?: boolean; assignee?: number }, command: Command) => {
        const ctx = context(command);
        const result = await ctx.client().comments.addView(viewId, {
          comment_text: text,
          notify_all: options.notifyAll,
          assignee: options.assignee,
        });
        printCreated(ctx, result);
      }
    );

  comments
    .command('subtypes <typeId>')
    .description('List post subtype IDs for a comment type (needs a workspace ID)')
    .action(async (typeId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().comments.subtypes(typeId);
      ctx.printer.list(result, {
        headers: ['ID', 'NAME'],
        rows: result.subtypes.map((subtype) => [subtype.id, subtype.name]),
        noun: 'subtypes',
      });
    });
}
