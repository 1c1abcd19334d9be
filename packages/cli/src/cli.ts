#!/usr/bin/env node
/**
 * clickup-cli entry point
 */

import open from 'open';
import { run } from './program.js';
import { inkPrompts } from './ui/prompts.js';

process.exitCode = await run(process.argv, {
  io: { stdout: process.stdout, stderr: process.stderr, stdin: process.stdin },
  env: process.env,
  prompts: inkPrompts,
  openUrl: (url) => open(url),
});
