/**
 * vodcat match <title> --year <n>
 * Read-only probe: which strategy would claim this title, and for which item.
 */

import { Command } from 'commander';

import { MatchPipeline } from '../matching/pipeline.js';
import { titleSimilarity } from '../matching/similarity.js';
import { errorMessage } from '../shared/errors.js';
import { isContentKind } from '../shared/types.js';
import { openCatalog } from './context.js';

interface MatchCliOptions {
  year: string;
  kind: string;
  titleEn?: string;
  config?: string;
  db?: string;
}

export function matchCommand(baseDir: string): Command {
  return new Command('match')
    .description('Show how a scraped title would resolve, without writing anything')
    .argument('<title>', 'Platform title')
    .requiredOption('-y, --year <n>', 'Release year')
    .option('-k, --kind <kind>', 'movie or series', 'movie')
    .option('-e, --title-en <title>', 'English or transliterated title')
    .option('-c, --config <path>', 'Config file')
    .option('-d, --db <path>', 'SQLite DB path (overrides config)')
    .action(async (title: string, opts: MatchCliOptions) => {
      try {
        const year = parseInt(opts.year, 10);
        if (!Number.isInteger(year)) {
          console.error(`Invalid year: ${opts.year}`);
          process.exit(1);
        }
        if (!isContentKind(opts.kind)) {
          console.error(`Invalid kind: ${opts.kind}`);
          process.exit(1);
        }
        const kind = opts.kind;

        const ctx = await openCatalog(baseDir, { configPath: opts.config, dbPath: opts.db, useRedis: false });
        const pipeline = MatchPipeline.create(ctx.db, ctx.variations, ctx.config.matching);
        const match = pipeline.run({ title, titleEn: opts.titleEn, year, kind });

        console.log(`\n"${title}" (${year}, ${kind})`);
        if (match) {
          console.log(`  Strategy : ${match.method}`);
          console.log(`  Item     : #${match.item.id} "${match.item.title}"` +
            `${match.item.titleEn ? ` / "${match.item.titleEn}"` : ''} (${match.item.year})`);
          console.log(`  Score    : ${match.score.toFixed(3)}`);
        } else {
          console.log('  No match: ingesting this record would create a new item');
          const nearest = ctx.db.findCandidates({
            minYear: year - ctx.config.matching.yearTolerance,
            maxYear: year + ctx.config.matching.yearTolerance,
            kind,
            limit: ctx.config.matching.candidateLimit,
          })
            .map(item => ({ item, score: titleSimilarity(title, item.title) }))
            .sort((a, b) => b.score - a.score)
            .slice(0, 3);
          for (const { item, score } of nearest) {
            console.log(`    nearest: #${item.id} "${item.title}" (${item.year}) ${score.toFixed(3)}`);
          }
        }
        await ctx.close();
      } catch (err) {
        console.error(errorMessage(err));
        process.exit(1);
      }
    });
}
