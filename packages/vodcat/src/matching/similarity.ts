/**
 * Title similarity (0..1) from two independent metrics, taking the max.
 * The sequence ratio handles near-identical native-script variants; Jaro–Winkler
 * tolerates the character drift of transliterations.
 */

import { normalize } from './normalize.js';

// ── Sequence ratio (Ratcliff/Obershelp) ───────────────────────────

/** Longest common run inside a[alo:ahi] × b[blo:bhi]; earliest run wins ties */
function longestMatch(
  a: string[],
  b: string[],
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): { i: number; j: number; size: number } {
  let best = { i: alo, j: blo, size: 0 };
  let prev = new Array<number>(bhi - blo + 1).fill(0);

  for (let i = alo; i < ahi; i++) {
    const cur = new Array<number>(bhi - blo + 1).fill(0);
    for (let j = blo; j < bhi; j++) {
      if (a[i] !== b[j]) continue;
      const k = prev[j - blo] + 1;
      cur[j - blo + 1] = k;
      if (k > best.size) best = { i: i - k + 1, j: j - k + 1, size: k };
    }
    prev = cur;
  }
  return best;
}

function matchingCharacters(a: string[], b: string[]): number {
  let total = 0;
  const stack: [number, number, number, number][] = [[0, a.length, 0, b.length]];

  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const m = longestMatch(a, b, alo, ahi, blo, bhi);
    if (m.size === 0) continue;
    total += m.size;
    if (alo < m.i && blo < m.j) stack.push([alo, m.i, blo, m.j]);
    if (m.i + m.size < ahi && m.j + m.size < bhi) stack.push([m.i + m.size, ahi, m.j + m.size, bhi]);
  }
  return total;
}

/** 2·M / T where M is the number of characters in matching runs */
export function sequenceRatio(a: string, b: string): number {
  const ac = Array.from(a);
  const bc = Array.from(b);
  const length = ac.length + bc.length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(ac, bc)) / length;
}

// ── Jaro–Winkler ──────────────────────────────────────────────────

export function jaro(a: string, b: string): number {
  if (a === b) return a.length > 0 ? 1 : 0;
  const s1 = Array.from(a);
  const s2 = Array.from(b);
  if (s1.length === 0 || s2.length === 0) return 0;

  const window = Math.max(0, Math.floor(Math.max(s1.length, s2.length) / 2) - 1);
  const s1Matched = new Array<boolean>(s1.length).fill(false);
  const s2Matched = new Array<boolean>(s2.length).fill(false);

  let matches = 0;
  for (let i = 0; i < s1.length; i++) {
    const lo = Math.max(0, i - window);
    const hi = Math.min(s2.length - 1, i + window);
    for (let j = lo; j <= hi; j++) {
      if (s2Matched[j] || s1[i] !== s2[j]) continue;
      s1Matched[i] = true;
      s2Matched[j] = true;
      matches++;
      break;
    }
  }
  if (matches === 0) return 0;

  let halfTranspositions = 0;
  let k = 0;
  for (let i = 0; i < s1.length; i++) {
    if (!s1Matched[i]) continue;
    while (!s2Matched[k]) k++;
    if (s1[i] !== s2[k]) halfTranspositions++;
    k++;
  }
  const transpositions = Math.floor(halfTranspositions / 2);

  return (
    matches / s1.length +
    matches / s2.length +
    (matches - transpositions) / matches
  ) / 3;
}

/**
 * Jaro similarity with the Winkler common-prefix boost
 * (up to 4 chars, only once the Jaro score passes 0.7).
 */
export function jaroWinkler(a: string, b: string, prefixScale = 0.1): number {
  const score = jaro(a, b);
  if (score <= 0.7) return score;

  const s1 = Array.from(a);
  const s2 = Array.from(b);
  let prefix = 0;
  const maxPrefix = Math.min(4, s1.length, s2.length);
  while (prefix < maxPrefix && s1[prefix] === s2[prefix]) prefix++;

  return score + prefix * prefixScale * (1 - score);
}

// ── Composite ─────────────────────────────────────────────────────

export function titleSimilarity(a: string | null | undefined, b: string | null | undefined): number {
  const na = normalize(a);
  const nb = normalize(b);
  if (!na || !nb) return 0;
  if (na === nb) return 1;
  return Math.min(1, Math.max(sequenceRatio(na, nb), jaroWinkler(na, nb)));
}
