/**
 * vodcat ingest <file>
 * Resolve a crawler dump (JSON array or JSON lines) into the catalog.
 */

import fs from 'node:fs';
import path from 'node:path';

import { Command } from 'commander';

import { parseRecordDump } from '../ingest/records.js';
import { runIngestion } from '../ingest/run.js';
import { errorMessage } from '../shared/errors.js';
import { isPlatform } from '../shared/types.js';
import { openCatalog } from './context.js';

interface IngestCliOptions {
  config?: string;
  db?: string;
  platform?: string;
  jobs?: string;
  cache: boolean;
}

export function ingestCommand(baseDir: string): Command {
  return new Command('ingest')
    .description('Resolve scraped records into canonical items and source mappings')
    .argument('<file>', 'Crawler output: JSON array or JSON lines')
    .option('-c, --config <path>', 'Config file')
    .option('-d, --db <path>', 'SQLite DB path (overrides config)')
    .option('-p, --platform <name>', 'Platform for records that do not name one (filimo, namava)')
    .option('-j, --jobs <n>', 'Concurrent resolutions (overrides config)')
    .option('--no-cache', 'Use an in-process match cache instead of Redis')
    .action(async (file: string, opts: IngestCliOptions) => {
      try {
        if (opts.platform !== undefined && !isPlatform(opts.platform)) {
          console.error(`Unknown platform: ${opts.platform}`);
          process.exit(1);
        }
        const platform = opts.platform !== undefined && isPlatform(opts.platform) ? opts.platform : undefined;

        if (opts.jobs !== undefined && !/^[1-9]\d*$/.test(opts.jobs.trim())) {
          console.error(`Invalid --jobs: ${opts.jobs} (expected a positive integer)`);
          process.exit(1);
        }

        const filePath = path.resolve(file);
        const records = parseRecordDump(fs.readFileSync(filePath, 'utf-8'));

        const ctx = await openCatalog(baseDir, { configPath: opts.config, dbPath: opts.db, useRedis: opts.cache });
        const jobs = opts.jobs !== undefined ? parseInt(opts.jobs, 10) : ctx.config.ingest.concurrency;

        console.log(`\nIngesting : ${filePath}`);
        console.log(`Records   : ${records.length}`);
        console.log(`Workers   : ${jobs}`);
        console.log('');

        const controller = new AbortController();
        const onSigint = () => {
          console.log('\nInterrupted: finishing in-flight records…');
          controller.abort();
        };
        process.once('SIGINT', onSigint);

        let lastPrint = 0;
        const result = await runIngestion(records, ctx.resolver, ctx.db, {
          concurrency: jobs,
          defaults: { platform },
          signal: controller.signal,
          onProgress: (p) => {
            const now = Date.now();
            if (now - lastPrint < 500) return;
            lastPrint = now;
            process.stdout.write(
              `\r  [${String(p.done).padStart(5)}/${p.total}] created=${p.created}  err=${p.errored}   `
            );
          },
        });
        process.removeListener('SIGINT', onSigint);
        await ctx.close();

        process.stdout.write('\n');
        console.log('\n── Ingest complete ──────────────────────────────────────');
        console.log(`  Records   : ${result.total}`);
        console.log(`  Created   : ${result.created}`);
        console.log(`  Matched   : ${result.matched}`);
        console.log(`  Linked    : ${result.linked}`);
        console.log(`  Relinked  : ${result.relinked}`);
        console.log(`  Skipped   : ${result.skipped}`);
        console.log(`  Errors    : ${result.errored}`);
        if (result.cancelled > 0) console.log(`  Cancelled : ${result.cancelled}`);
        console.log(`  Duration  : ${result.durationSec.toFixed(1)}s`);

        if (result.errors.length > 0) {
          console.log(`\n  First ${Math.min(10, result.errors.length)} problems:`);
          for (const e of result.errors.slice(0, 10)) {
            console.log(`    #${e.index}${e.sourceId ? ` ${e.sourceId}` : ''}: ${e.error.slice(0, 80)}`);
          }
        }
        if (result.errored > 0) process.exitCode = 1;
      } catch (err) {
        console.error(errorMessage(err));
        process.exit(1);
      }
    });
}
