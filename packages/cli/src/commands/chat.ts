/**
 * chat: channels and messages (v3, needs a workspace ID).
 */

import type { Command } from 'commander';
import type { ChatChannel } from '@clickup-cli/core';
import type { CommandContext } from '../context.js';
import { noteNextCursor, parseContentFormat, textArgument, type ContextFactory } from './shared.js';

function printChannel(ctx: CommandContext, channel: ChatChannel): void {
  ctx.printer.record(channel, [
    ['ID', channel.id],
    ['Name', channel.name],
    ['Type', channel.type],
    ['Members', channel.member_count],
  ]);
}

export function registerChat(program: Command, context: ContextFactory): void {
  const chat = program.command('chat').description('Chat channels and messages');

  chat
    .command('channels')
    .description('List chat channels')
    .option('--cursor <cursor>', 'Page cursor from a previous call')
    .action(async (options: { cursor?: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().chat.listChannels(options.cursor);
      ctx.printer.list(result, {
        headers: ['ID', 'NAME', 'TYPE'],
        rows: result.data.map((channel) => [channel.id, channel.name, channel.type]),
        noun: 'channels',
      });
      noteNextCursor(ctx, result);
    });

  chat
    .command('channel <channelId>')
    .description('Get a chat channel')
    .action(async (channelId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      printChannel(ctx, await ctx.client().chat.getChannel(channelId));
    });

  chat
    .command('create-channel <name>')
    .description('Create a chat channel')
    .option('--description <text>', 'Channel description')
    .option('--private', 'Make the channel private')
    .action(async (name: string, options: { description?: string; private?: boolean }, command: Command) => {
      const ctx = context(command);
      const channel = await ctx.client().chat.createChannel({
        name,
        description: options.description,
        visibility: options.private ? 'PRIVATE' : undefined,
      });
      printChannel(ctx, channel);
    });

  chat
    .command('delete-channel <channelId>')
    .description('Delete a chat channel')
    .action(async (channelId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete channel ${channelId}`);
      await ctx.client().chat.deleteChannel(channelId);
      ctx.printer.success(`Channel ${channelId} deleted`, { channel_id: channelId });
    });

  chat
    .command('messages <channelId>')
    .description('List messages in a channel')
    .option('--cursor <cursor>', 'Page cursor from a previous call')
    .action(async (channelId: string, options: { cursor?: string }, command: Command) => {
      const ctx = context(command);
      const result = await ctx.client().chat.listMessages(channelId, options.cursor);
      ctx.printer.list(result, {
        headers: ['ID', 'USER', 'DATE', 'CONTENT'],
        rows: result.data.map((message) => [message.id, message.user_id, message.date_created, message.content]),
        noun: 'messages',
      });
      noteNextCursor(ctx, result);
    });

  chat
    .command('send <channelId> <content>')
    .description('Send a message ("-" reads the content from stdin)')
    .option('--post', 'Send as a post instead of a message')
    .option('--format <format>', 'text/md or text/plain', 'text/md')
    .action(
      async (channelId: string, content: string, options: { post?: boolean; format: string }, command: Command) => {
        const ctx = context(command);
        const message = await ctx.client().chat.sendMessage(channelId, {
          content: await textArgument(ctx, content),
          type: options.post ? 'post' : 'message',
          content_format: parseContentFormat(options.format),
        });
        ctx.printer.record(message, [
          ['ID', message.id],
          ['Date', message.date_created],
        ]);
      }
    );

  chat
    .command('delete-message <messageId>')
    .description('Delete a message')
    .action(async (messageId: string, _options: unknown, command: Command) => {
      const ctx = context(command);
      await ctx.confirmDestructive(`delete message ${messageId}`);
      await ctx.client().chat.deleteMessage(messageId);
      ctx.printer.success(`Message ${messageId} deleted`, { message_id: messageId });
    });
}
