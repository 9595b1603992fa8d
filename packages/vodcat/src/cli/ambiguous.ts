import { Command } from 'commander';

import { errorMessage } from '../shared/errors.js';
import { openCatalog } from './context.js';

interface AmbiguousCliOptions {
  limit: string;
  config?: string;
  db?: string;
}

export function ambiguousCommand(baseDir: string): Command {
  return new Command('ambiguous')
    .description('List variation matches that were refused because several items qualified')
    .option('-n, --limit <n>', 'Rows to show', '20')
    .option('-c, --config <path>', 'Config file')
    .option('-d, --db <path>', 'SQLite DB path (overrides config)')
    .action(async (opts: AmbiguousCliOptions) => {
      try {
        const ctx = await openCatalog(baseDir, { configPath: opts.config, dbPath: opts.db, useRedis: false });
        const rows = ctx.db.getPendingAmbiguousMatches(parseInt(opts.limit, 10) || 20);
        await ctx.close();

        if (rows.length === 0) {
          console.log('No unreviewed ambiguous matches.');
          return;
        }
        for (const row of rows) {
          console.log(
            `${row.created_at}  "${row.title}" (${row.year}) → base "${row.base_title}" ` +
            `candidates ${row.candidate_ids}`
          );
        }
      } catch (err) {
        console.error(errorMessage(err));
        process.exit(1);
      }
    });
}
