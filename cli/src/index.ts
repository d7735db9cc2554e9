#!/usr/bin/env node
import { Command } from 'commander';
import { registerRouteCommand } from './commands/route.js';
import { registerToolsCommand } from './commands/tools.js';

const program = new Command();
program
  .name('ledger-route')
  .description('Route accounting questions (English / Indonesian) to MCP tools')
  .version('0.1.0');

registerRouteCommand(program);
registerToolsCommand(program);

program.parse();
