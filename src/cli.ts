#!/usr/bin/env node
/**
 * Rangewatch CLI
 *
 * Commands:
 *   watch (default)        Watch connections and alert on targeted ranges
 *   check <address...>     Classify addresses against the configuration
 *   config                 View or edit configuration
 *   init                   Create .rangewatch/config.yaml
 *
 * Global Options:
 *   --quiet               Suppress informational output
 *   --verbose             Show a summary line for every cycle
 */

import { Command } from 'commander';
import { registerWatchCommand } from './commands/watch.js';
import { registerCheckCommand } from './commands/check.js';
import { registerConfigCommand } from './commands/config.js';
import { registerInitCommand } from './commands/init.js';

const program = new Command();

program
    .name('rangewatch')
    .description('Alerts when this host connects into watched address ranges')
    .version('1.0.0')
    .option('-q, --quiet', 'Suppress informational output')
    .option('-v, --verbose', 'Show detailed output');

registerWatchCommand(program);
registerCheckCommand(program);
registerConfigCommand(program);
registerInitCommand(program);

await program.parseAsync();
