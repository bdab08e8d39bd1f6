#!/usr/bin/env node

import { Command } from 'commander';
import { demoCommand } from './commands/demo.js';
import { initCommand } from './commands/init.js';
import { setLogLevel } from './utils/logger.js';

const program = new Command();

program
  .name('agentnet')
  .description('Multi-agent simulation building blocks, with a runnable echo demo')
  .version('0.1.0')
  .option('-v, --verbose', 'Enable verbose logging')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.verbose) {
      setLogLevel('debug');
    }
  });

// Running `agentnet` with no command runs the demo
program.addCommand(demoCommand, { isDefault: true });
program.addCommand(initCommand);

await program.parseAsync();
