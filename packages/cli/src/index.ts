#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { z } from 'zod';
import { registerInitCommand } from './commands/init.js';
import { registerIndexCommand } from './commands/index-cmd.js';
import { registerSearchCommand } from './commands/search.js';
import { registerStatusCommand } from './commands/status.js';

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('@sift/cli/package.json'));

const program = new Command();
program
  .name('sift')
  .description('Adaptive multi-strategy search over local files')
  .version(pkg.version);

registerInitCommand(program);
registerIndexCommand(program);
registerSearchCommand(program);
registerStatusCommand(program);

await program.parseAsync();
