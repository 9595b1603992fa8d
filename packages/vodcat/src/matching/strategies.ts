/**
 * Matching strategies: Exact, Fuzzy, Variation.
 * Each queries a bounded slice of the catalog and returns a match or undefined.
 * None of them write; ambiguity is reported through a callback.
 */

import type { AmbiguousMatchInput, CatalogRepository } from '../db/types.js';
import type { Logger } from '../shared/logger.js';
import type { CanonicalItem, MatchingConfig } from '../shared/types.js';
import { normalize } from './normalize.js';
import { titleSimilarity } from './similarity.js';
import type { MatchInput, MatchStrategy, StrategyMatch } from './types.js';
import type { VariationTable } from './variations.js';

export type FuzzyOptions = Pick<MatchingConfig, 'fuzzyThreshold' | 'yearTolerance' | 'candidateLimit' | 'variationBoost'>;

function inputTitles(input: MatchInput): string[] {
  return input.titleEn ? [input.title, input.titleEn] : [input.title];
}

function itemTitles(item: CanonicalItem): string[] {
  return item.titleEn ? [item.title, item.titleEn] : [item.title];
}

// ── Exact ─────────────────────────────────────────────────────────

/** Same year, same normalised title (native or English on either side); first by id wins */
export class ExactStrategy implements MatchStrategy {
  readonly name = 'exact' as const;

  constructor(private readonly repo: CatalogRepository) {}

  tryMatch(input: MatchInput): StrategyMatch | undefined {
    if (!input.year) return undefined;

    for (const title of inputTitles(input)) {
      const key = normalize(title);
      if (!key) continue;
      const [item] = this.repo.findItemsByKey(key, input.year);
      if (item) return { item, method: this.name, score: 1 };
    }
    return undefined;
  }
}

// ── Fuzzy ─────────────────────────────────────────────────────────

/**
 * Best similarity among same-kind items within ±yearTolerance, capped at candidateLimit.
 * Candidates arrive ordered by id and only a strictly higher score replaces the
 * current best, so ties resolve to the oldest item.
 */
export class FuzzyStrategy implements MatchStrategy {
  readonly name = 'fuzzy' as const;

  constructor(
    private readonly repo: CatalogRepository,
    private readonly variations: VariationTable,
    private readonly opts: FuzzyOptions
  ) {}

  tryMatch(input: MatchInput): StrategyMatch | undefined {
    if (!input.year) return undefined;

    const candidates = this.repo.findCandidates({
      minYear: input.year - this.opts.yearTolerance,
      maxYear: input.year + this.opts.yearTolerance,
      kind: input.kind,
      limit: this.opts.candidateLimit,
    });

    let best: StrategyMatch | undefined;
    for (const item of candidates) {
      const score = this.score(input, item);
      if (score >= this.opts.fuzzyThreshold && score > (best?.score ?? 0)) {
        best = { item, method: this.name, score };
      }
    }
    return best;
  }

  score(input: MatchInput, item: CanonicalItem): number {
    let score = 0;
    for (const a of inputTitles(input)) {
      for (const b of itemTitles(item)) {
        score = Math.max(score, titleSimilarity(a, b));
        if (this.variations.areRelated(a, b)) {
          score = Math.max(score, this.opts.variationBoost);
        }
      }
    }
    return score;
  }
}

// ── Variation ─────────────────────────────────────────────────────

/**
 * The scraped title is a curated alternate of a base title: look the base up directly.
 * More than one candidate is ambiguous and counts as no match.
 */
export class VariationStrategy implements MatchStrategy {
  readonly name = 'variation' as const;

  constructor(
    private readonly repo: CatalogRepository,
    private readonly variations: VariationTable,
    private readonly logger: Logger,
    private readonly onAmbiguous?: (match: AmbiguousMatchInput) => void
  ) {}

  tryMatch(input: MatchInput): StrategyMatch | undefined {
    if (!input.year) return undefined;

    for (const title of inputTitles(input)) {
      for (const base of this.variations.basesOf(title)) {
        const items = this.repo.findItemsByKeyFragment(base, input.year);
        if (items.length === 1) {
          return { item: items[0], method: this.name, score: 1 };
        }
        if (items.length > 1) {
          this.logger.warn(
            `Ambiguous variation match: "${title}" (${input.year}) → ${items.length} items for base ` +
            `"${this.variations.displayBase(base)}" [${items.map(i => i.id).join(', ')}]`
          );
          this.onAmbiguous?.({
            title,
            year: input.year,
            baseTitle: this.variations.displayBase(base),
            candidateIds: items.map(i => i.id),
          });
        }
      }
    }
    return undefined;
  }
}
