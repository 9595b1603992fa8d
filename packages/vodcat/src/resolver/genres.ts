import type { CatalogRepository } from '../db/types.js';

/**
 * Genre name → id memo for one ingestion run.
 * Names are trimmed and matched exactly; blanks are dropped.
 */
export class GenreCache {
  private readonly ids = new Map<string, number>();

  constructor(private readonly repo: Pick<CatalogRepository, 'getOrCreateGenre'>) {}

  get size(): number {
    return this.ids.size;
  }

  /** Ids for the given names, in first-seen order, without duplicates */
  resolve(names: readonly string[] | undefined): number[] {
    const result: number[] = [];
    for (const raw of names ?? []) {
      const name = raw.trim();
      if (!name) continue;

      let id = this.ids.get(name);
      if (id === undefined) {
        id = this.repo.getOrCreateGenre(name).id;
        this.ids.set(name, id);
      }
      if (!result.includes(id)) result.push(id);
    }
    return result;
  }
}
