/**
 * Known alternate renderings (transliterations, translations) of base titles.
 * Curated out-of-band in a JSON file; read-only at run time.
 * All lookups compare normalised forms.
 */

import fs from 'node:fs';

import { normalize } from './normalize.js';

/** { "<base title>": ["<alternate>", ...] } */
export type VariationData = Record<string, string[]>;

export class VariationTable {
  private readonly variants = new Map<string, Set<string>>();
  private readonly bases = new Map<string, string[]>();
  private readonly rawBases = new Map<string, string>();

  constructor(data: VariationData) {
    for (const [rawBase, alternates] of Object.entries(data)) {
      const base = normalize(rawBase);
      if (!base) continue;
      this.rawBases.set(base, rawBase);

      const set = this.variants.get(base) ?? new Set<string>();
      for (const alt of alternates) {
        const key = normalize(alt);
        if (!key || key === base || set.has(key)) continue;
        set.add(key);
        const owners = this.bases.get(key) ?? [];
        owners.push(base);
        this.bases.set(key, owners);
      }
      this.variants.set(base, set);
    }
  }

  static empty(): VariationTable {
    return new VariationTable({});
  }

  static fromFile(filePath: string): VariationTable {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return new VariationTable(parseVariationData(parsed, filePath));
  }

  /** Number of base titles */
  get size(): number {
    return this.variants.size;
  }

  variantsOf(base: string): ReadonlySet<string> {
    return this.variants.get(normalize(base)) ?? new Set<string>();
  }

  isVariationOf(base: string, candidate: string): boolean {
    const key = normalize(candidate);
    return key.length > 0 && this.variantsOf(base).has(key);
  }

  /** Normalised base titles the candidate is a known alternate of, in file order */
  basesOf(candidate: string): string[] {
    return [...(this.bases.get(normalize(candidate)) ?? [])];
  }

  /** Base title as written in the variations file */
  displayBase(base: string): string {
    const key = normalize(base);
    return this.rawBases.get(key) ?? base;
  }

  /** True when two different titles belong to one family (a base plus its alternates) */
  areRelated(a: string, b: string): boolean {
    const na = normalize(a);
    const nb = normalize(b);
    if (!na || !nb || na === nb) return false;
    const familyA = this.familiesOf(na);
    return this.familiesOf(nb).some(base => familyA.includes(base));
  }

  private familiesOf(key: string): string[] {
    const families = [...(this.bases.get(key) ?? [])];
    if (this.variants.has(key)) families.push(key);
    return families;
  }
}

function parseVariationData(value: unknown, source: string): VariationData {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`${source}: expected an object of base title → alternates`);
  }
  const out: VariationData = {};
  for (const [base, alternates] of Object.entries(value)) {
    if (!Array.isArray(alternates) || !alternates.every(a => typeof a === 'string')) {
      throw new Error(`${source}: alternates for "${base}" must be an array of strings`);
    }
    out[base] = alternates;
  }
  return out;
}
