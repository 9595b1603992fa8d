/**
 * Matching strategy contracts: no storage imports beyond the repository interface.
 */

import type { CanonicalItem, ContentKind, MatchMethod } from '../shared/types.js';

export interface MatchInput {
  title: string;
  titleEn?: string;
  year?: number;
  kind: ContentKind;
}

export interface StrategyMatch {
  item: CanonicalItem;
  method: MatchMethod;
  score: number;   // 0..1
}

export interface MatchStrategy {
  readonly name: MatchMethod;
  tryMatch(input: MatchInput): StrategyMatch | undefined;
}
