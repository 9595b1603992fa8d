/**
 * MatchPipeline: ordered, short-circuiting: Exact → Fuzzy → Variation.
 * Reads only; the resolver owns the transaction it runs inside.
 */

import type { AmbiguousMatchInput, CatalogRepository } from '../db/types.js';
import { logger as defaultLogger, type Logger } from '../shared/logger.js';
import { ExactStrategy, FuzzyStrategy, VariationStrategy, type FuzzyOptions } from './strategies.js';
import type { MatchInput, MatchStrategy, StrategyMatch } from './types.js';
import type { VariationTable } from './variations.js';

export interface PipelineOptions {
  logger?: Logger;
  /** Called when the variation strategy refuses to pick between several items */
  onAmbiguous?: (match: AmbiguousMatchInput) => void;
}

export class MatchPipeline {
  constructor(
    private readonly strategies: readonly MatchStrategy[],
    private readonly logger: Logger = defaultLogger
  ) {}

  static create(
    repo: CatalogRepository,
    variations: VariationTable,
    matching: FuzzyOptions,
    opts: PipelineOptions = {}
  ): MatchPipeline {
    const logger = opts.logger ?? defaultLogger;
    return new MatchPipeline(
      [
        new ExactStrategy(repo),
        new FuzzyStrategy(repo, variations, matching),
        new VariationStrategy(repo, variations, logger, opts.onAmbiguous),
      ],
      logger
    );
  }

  get strategyNames(): string[] {
    return this.strategies.map(s => s.name);
  }

  run(input: MatchInput): StrategyMatch | undefined {
    for (const strategy of this.strategies) {
      const match = strategy.tryMatch(input);
      if (match) {
        this.logger.info(
          `${strategy.name} match: "${input.title}" (${input.year}) → #${match.item.id} ` +
          `"${match.item.title}" (${match.item.year}) score=${match.score.toFixed(2)}`
        );
        return match;
      }
    }
    this.logger.debug(`No match for "${input.title}" (${input.year ?? 'no year'})`);
    return undefined;
  }
}
