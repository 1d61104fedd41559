#!/usr/bin/env node
import { Command } from 'commander';
import { checkCommand } from './commands/check.js';

const program = new Command()
  .name('tenet')
  .description('Constraint-based assertions for declarative test cases')
  .version('0.1.0');

program.addCommand(checkCommand);

await program.parseAsync();
