import type { Command } from 'commander';
import { APP_NAME, VERSION } from '@clickup-cli/core';
import type { ContextFactory } from './shared.js';

export function registerVersion(program: Command, context: ContextFactory): void {
  program
    .command('version')
    .description('Print version')
    .action(async (_options: unknown, command: Command) => {
      const ctx = context(command);
      ctx.printer.record({ name: APP_NAME, version: VERSION }, [['Version', `${APP_NAME} ${VERSION}`]]);
    });
}
