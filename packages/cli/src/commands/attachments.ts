/**
 * attachments: file uploads to tasks (v2) and other parents (v3).
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Command } from 'commander';
import type { Attachment } from '@clickup-cli/core';
import { UserFacingError } from '../errfmt.js';
import type { CommandContext } from '../context.js';
import type { ContextFactory } from './shared.js';

const HEADERS = ['ID', 'TITLE', 'SIZE', 'URL'];

/**
 * Stream `filePath` into `upload`, closing the file whatever happens.
 */
async function withFile<T>(filePath: string, upload: (stream: fs.ReadStream, fileName: string) => Promise<T>): Promise<T> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(filePath);
  } catch (error) {
    throw new UserFacingError(`open file: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }
  if (!stat.isFile()) {
    throw new UserFacingError(`open file: ${filePath} is not a regular file`);
  }

  const stream = fs.createReadStream(filePath);
  try {
    return await upload(stream, path.basename(filePath));
  } finally {
    stream.destroy();
  }
}

function printUploaded(ctx: CommandContext, attachment: Attachment): void {
  ctx.printer.note(`Uploaded attachment: ${attachment.title}`);
  ctx.printer.record(attachment, [
    ['ID', attachment.id],
    ['Title', attachment.title],
    ['Size', attachment.size],
    ['URL', attachment.url],
  ]);
}

export function registerAttachments(program: Command, context: ContextFactory): void {
  const attachments = program.command('attachments').description('File attachments');

  attachments
    .command('upload <file>')
    .description('Upload a file to a task')
    .requiredOption('--task <taskId>', 'Task ID')
    .action(async (file: string, options: { task: string }, command: Command) => {
      const ctx = context(command);
      const attachment = await withFile(file, (stream, fileName) =>
        ctx.client().attachments.upload(options.task, fileName, stream)
      );
      printUploaded(ctx, attachment);
    });

  attachments
    .command('list')
    .description('List attachments on a task, list, folder or space (needs a workspace ID)')
    .requiredOption('-t, --type <type>', 'Parent type (task, list, folder, space)')
    .requiredOption('-i, --id <id>', 'Parent ID')
    .action(async (options: { type: string; id: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().attachments.list(options.type, options.id);
      ctx.printer.list(result, {
        headers: HEADERS,
        rows: result.attachments.map((item) => [item.id, item.title, item.size, item.url]),
        noun: 'attachments',
      });
    });

  attachments
    .command('create <file>')
    .description('Upload a file to a task, list, folder or space (needs a workspace ID)')
    .requiredOption('-t, --type <type>', 'Parent type (task, list, folder, space)')
    .requiredOption('-i, --id <id>', 'Parent ID')
    .action(async (file: string, options: { type: string; id: string }, command: Command) => {
      const ctx = context(command);
      const attachment = await withFile(file, (stream, fileName) =>
        ctx.client().attachments.create(options.type, options.id, fileName, stream)
      );
      printUploaded(ctx, attachment);
    });
}
