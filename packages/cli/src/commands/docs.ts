/**
 * docs: documents and their pages (v3, needs a workspace ID).
 */

import type { Command } from 'commander';
import type { Doc, DocPage } from '@clickup-cli/core';
import { UsageError } from '../errfmt.js';
import type { CommandContext } from '../context.js';
import { noteNextCursor, parseContentFormat, textArgument, type ContextFactory } from './shared.js';

type EditMode = 'replace' | 'append' | 'prepend';

function parseEditMode(value: string): EditMode {
  if (value === 'replace' || value === 'append' || value === 'prepend') {
    return value;
  }
  throw new UsageError(`invalid mode "${value}" (expected replace, append or prepend)`);
}

function printDoc(ctx: CommandContext, doc: Doc): void {
  ctx.printer.record(doc, [
    ['ID', doc.id],
    ['Name', doc.name],
    ['Created', doc.date_created],
    ['Parent', doc.parent ? `${doc.parent.id} (type ${doc.parent.type})` : undefined],
  ]);
}

function printPage(ctx: CommandContext, page: DocPage): void {
  ctx.printer.record(page, [
    ['ID', page.id],
    ['Name', page.name],
    ['Content', page.content],
  ]);
}

export function registerDocs(program: Command, context: ContextFactory): void {
  const docs = program.command('docs').description('Docs and pages');

  docs
    .command('search [query]')
    .description('Search docs in the workspace')
    .option('--cursor <cursor>', 'Page cursor from a previous call')
    .action(async (searchQuery: string | undefined, options: { cursor?: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().docs.search(searchQuery, options.cursor);
      ctx.printer.list(result, {
        headers: ['ID', 'NAME', 'CREATED'],
        rows: result.docs.map((doc) => [doc.id, doc.name, doc.date_created]),
        noun: 'docs',
      });
      noteNextCursor(ctx, result);
    });

  docs
    .command('get <docId>')
    .description('Get a doc')
    .action(async (docId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printDoc(ctx, await ctx.client().docs.get(docId));
    });

  docs
    .command('create <name>')
    .description('Create a doc')
    .option('--parent-type <type>', 'space, folder, list or workspace')
    .option('--parent-id <id>', 'Parent ID')
    .option('--private', 'Make the doc private')
    .action(
      async (
        name: string,
        options: { parentType?: string; parentId?: string; private?: boolean },
        command: Command
      ) => {
        const ctx = context(command);
        const doc = await ctx.client().docs.create({
          name,
          parentType: options.parentType,
          parentId: options.parentId,
          visibility: options.private ? 'PRIVATE' : undefined,
        });
        printDoc(ctx, doc);
      }
    );

  docs
    .command('pages <docId>')
    .description('List pages in a doc')
    .action(async (docId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      const pages = await ctx.client().docs.pages(docId);
      ctx.printer.list(pages, {
        headers: ['ID', 'NAME'],
        rows: pages.map((page) => [page.id, page.name]),
        noun: 'pages',
      });
    });

  docs
    .command('page <docId> <pageId>')
    .description('Get a page with its content')
    .action(async (docId: string, pageId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printPage(ctx, await ctx.client().docs.getPage(docId, pageId));
    });

  docs
    .command('create-page <docId> <name>')
    .description('Add a page to a doc')
    .option('--content <text>', 'Page content ("-" reads stdin)')
    .option('--format <format>', 'text/md or text/plain', 'text/md')
    .option('--parent-page <pageId>', 'Nest under this page')
    .action(
      async (
        docId: string,
        name: string,
        options: { content?: string; format: string; parentPage?: string },
        command: Command
      ) => {
        const ctx = context(command);
        const page = await ctx.client().docs.createPage(docId, {
          name,
          content: options.content === undefined ? undefined : await textArgument(ctx, options.content),
          content_format: parseContentFormat(options.format),
          parent_page_id: options.parentPage,
        });
        printPage(ctx, page);
      }
    );

  docs
    .command('edit-page <docId> <pageId>')
    .description('Edit a page name or content')
    .option('--name <name>', 'New page name')
    .option('--content <text>', 'New content ("-" reads stdin)')
    .option('--format <format>', 'text/md or text/plain', 'text/md')
    .option('--mode <mode>', 'replace, append or prepend', 'replace')
    .action(
      async (
        docId: string,
        pageId: string,
        options: { name?: string; content?: string; format: string; mode: string },
        command: Command
      ) => {
        const ctx = context(command);
        if (options.name === undefined && options.content === undefined) {
          throw new UsageError('nothing to change; pass --name or --content');
        }
        await ctx.client().docs.editPage(docId, pageId, {
          name: options.name,
          content: options.content === undefined ? undefined : await textArgument(ctx, options.content),
          content_format: parseContentFormat(options.format),
          content_edit_mode: parseEditMode(options.mode),
        });
        ctx.printer.success(`Page ${pageId} updated`, { doc_id: docId, page_id: pageId });
      }
    );
}
