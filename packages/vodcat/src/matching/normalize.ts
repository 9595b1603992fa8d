/**
 * Title normalisation: the comparison key every strategy works on.
 * Pure and deterministic; an empty key means "cannot match".
 */

// Articles, conjunctions and prepositions that carry no identity
const ENGLISH_STOP_WORDS = [
  'the', 'a', 'an', 'and', 'or', 'but',
  'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by',
];

const PERSIAN_STOP_WORDS = ['در', 'با', 'از', 'به', 'برای', 'و'];

export const STOP_WORDS: ReadonlySet<string> = new Set([
  ...ENGLISH_STOP_WORDS,
  ...PERSIAN_STOP_WORDS,
]);

// Arabic code points that Persian sites use interchangeably with the Persian ones
const ARABIC_TO_PERSIAN: Record<string, string> = {
  'ي': 'ی',
  'ى': 'ی',
  'ك': 'ک',
};

export function normalize(title: string | null | undefined): string {
  if (!title) return '';

  const cleaned = title
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[يىك]/g, ch => ARABIC_TO_PERSIAN[ch] ?? ch)
    .replace(/[^\p{L}\p{M}\p{N}_\s]/gu, ' ');

  return cleaned
    .split(/\s+/)
    .filter(word => word.length > 0 && !STOP_WORDS.has(word))
    .join(' ');
}
