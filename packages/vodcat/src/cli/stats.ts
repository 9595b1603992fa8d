import { Command } from 'commander';

import { errorMessage } from '../shared/errors.js';
import { openCatalog } from './context.js';

interface StatsCliOptions {
  config?: string;
  db?: string;
}

export function statsCommand(baseDir: string): Command {
  return new Command('stats')
    .description('Catalog totals: items by kind, sources by platform, genres')
    .option('-c, --config <path>', 'Config file')
    .option('-d, --db <path>', 'SQLite DB path (overrides config)')
    .action(async (opts: StatsCliOptions) => {
      try {
        const ctx = await openCatalog(baseDir, { configPath: opts.config, dbPath: opts.db, useRedis: false });
        const stats = ctx.db.getStats();
        await ctx.close();

        console.log('\n── Catalog ──────────────────────────────────────────────');
        console.log(`  Movies   : ${stats.items.movie}`);
        console.log(`  Series   : ${stats.items.series}`);
        console.log(`  Filimo   : ${stats.sources.filimo} listings`);
        console.log(`  Namava   : ${stats.sources.namava} listings`);
        console.log(`  Genres   : ${stats.genres}`);
      } catch (err) {
        console.error(errorMessage(err));
        process.exit(1);
      }
    });
}
