#!/usr/bin/env node
/**
 * vodcat - one canonical catalog entry per work across VOD platforms
 */

import path from 'node:path';

import { Command } from 'commander';

import { ingestCommand } from './cli/ingest.js';
import { matchCommand } from './cli/match.js';
import { statsCommand } from './cli/stats.js';
import { ambiguousCommand } from './cli/ambiguous.js';
import { errorMessage } from './shared/errors.js';

const baseDir = path.resolve(__dirname, '..');

const program = new Command();

program
  .name('vodcat')
  .description('Resolve scraped VOD listings into a deduplicated catalog')
  .version('0.1.0');

// Register subcommands
program.addCommand(ingestCommand(baseDir));
program.addCommand(matchCommand(baseDir));
program.addCommand(statsCommand(baseDir));
program.addCommand(ambiguousCommand(baseDir));

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
