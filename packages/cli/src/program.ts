/**
 * Commander program for clickup-cli and the run loop that maps failures to
 * exit codes.
 */

import { Command, CommanderError } from 'commander';
import { APP_NAME, VERSION } from '@clickup-cli/core';
import { registerAttachments } from './commands/attachments.js';
import { registerAuth } from './commands/auth.js';
import { registerChat } from './commands/chat.js';
import { registerComments } from './commands/comments.js';
import { registerDocs } from './commands/docs.js';
import { registerGoals } from './commands/goals.js';
import { registerGroups, registerRoles } from './commands/groups.js';
import { registerFolders, registerLists, registerSpaces } from './commands/hierarchy.js';
import type { ContextFactory } from './commands/shared.js';
import { registerTags } from './commands/tags.js';
import { registerTasks } from './commands/tasks.js';
import { registerTime } from './commands/time.js';
import { registerVersion } from './commands/version.js';
import { registerWebhooks } from './commands/webhooks.js';
import { registerWorkspaces } from './commands/workspaces.js';
import { CommandContext, readGlobalOptions, type CliDependencies } from './context.js';
import { EXIT_OK, exitCodeFor, formatError } from './errfmt.js';
import { modeDefaultsFromEnv } from './output/outfmt.js';

export function createProgram(deps: CliDependencies): Command {
  const envMode = modeDefaultsFromEnv(deps.env);
  const program = new Command();

  // Subcommands copy these settings when they are created, so configure first
  program
    .name(APP_NAME)
    .description('ClickUp CLI - project management from the command line')
    .version(VERSION, '--version', 'Print version and exit')
    .option('--json', 'Output JSON to stdout (best for scripting)', envMode.json)
    .option('--plain', 'Output stable, parseable text to stdout (TSV; no colors)', envMode.plain)
    .option('--verbose', 'Enable verbose logging', false)
    .option('--debug-log', 'Also write logs to a session file under the config directory', false)
    .option('--workspace <id>', 'Workspace ID for v3 API calls (chat, docs, attachments, task move)')
    .option('--no-input', 'Never prompt; fail instead (useful for CI)')
    .option('--force', 'Skip confirmations for destructive commands', false)
    .exitOverride()
    .showHelpAfterError('(run with --help for usage)')
    .configureOutput({
      writeOut: (text) => deps.io.stdout.write(text),
      writeErr: (text) => deps.io.stderr.write(text),
    });

  const context: ContextFactory = (command) =>
    new CommandContext(deps, readGlobalOptions(command.optsWithGlobals()));

  registerAuth(program, context);
  registerWorkspaces(program, context);
  registerGroups(program, context);
  registerRoles(program, context);
  registerSpaces(program, context);
  registerFolders(program, context);
  registerLists(program, context);
  registerTasks(program, context);
  registerComments(program, context);
  registerTime(program, context);
  registerTags(program, context);
  registerWebhooks(program, context);
  registerGoals(program, context);
  registerAttachments(program, context);
  registerChat(program, context);
  registerDocs(program, context);
  registerVersion(program, context);

  return program;
}

/**
 * Parse `argv` (node-style, program path first) and run the command.
 * Never throws; resolves to the process exit code.
 */
export async function run(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const program = createProgram(deps);

  try {
    await program.parseAsync([...argv]);
    return EXIT_OK;
  } catch (error) {
    // Commander has already printed its own parse errors
    if (!(error instanceof CommanderError)) {
      deps.io.stderr.write(formatError(error) + '\n');
    }
    return exitCodeFor(error);
  }
}
