import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { VariationTable } from '../../matching/variations.js';

const table = new VariationTable({
  'متری شیش و نیم': ['metri shish o nim', 'Just 6.5'],
  'Drive': ['Drive (Persian dub)'],
});

describe('VariationTable', () => {
  it('recognises alternates on normalised forms', () => {
    expect(table.isVariationOf('متری شیش و نیم', 'Metri Shish o Nim')).toBe(true);
    expect(table.isVariationOf('متری شیش نیم', 'JUST 6.5!')).toBe(true);
    expect(table.isVariationOf('متری شیش و نیم', 'Drive')).toBe(false);
  });

  it('lists variants of a base', () => {
    expect([...table.variantsOf('متری شیش و نیم')]).toEqual(['metri shish o nim', 'just 6 5']);
    expect(table.variantsOf('Unknown').size).toBe(0);
  });

  it('finds the bases an alternate belongs to', () => {
    expect(table.basesOf('just 6.5')).toEqual(['متری شیش نیم']);
    expect(table.basesOf('Drive')).toEqual([]);
  });

  it('keeps the base as written for display', () => {
    expect(table.displayBase('متری شیش نیم')).toBe('متری شیش و نیم');
  });

  it('relates members of one family, including the base', () => {
    expect(table.areRelated('metri shish o nim', 'Just 6.5')).toBe(true);
    expect(table.areRelated('متری شیش و نیم', 'Just 6.5')).toBe(true);
    expect(table.areRelated('Just 6.5', 'Drive (Persian dub)')).toBe(false);
    expect(table.areRelated('Just 6.5', 'just 6.5')).toBe(false);
  });

  it('counts bases', () => {
    expect(table.size).toBe(2);
    expect(VariationTable.empty().size).toBe(0);
  });

  describe('fromFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vodcat-variations-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('loads a base → alternates object', () => {
      const file = path.join(dir, 'variations.json');
      fs.writeFileSync(file, JSON.stringify({ 'خانه پدری': ['khane pedari'] }));
      const loaded = VariationTable.fromFile(file);
      expect(loaded.basesOf('Khane Pedari')).toEqual(['خانه پدری']);
    });

    it('rejects alternates that are not string arrays', () => {
      const file = path.join(dir, 'bad.json');
      fs.writeFileSync(file, JSON.stringify({ 'خانه پدری': 'khane pedari' }));
      expect(() => VariationTable.fromFile(file)).toThrow('alternates for "خانه پدری" must be an array of strings');
    });

    it('loads the bundled table', () => {
      const bundled = VariationTable.fromFile(path.resolve(__dirname, '../../../data/variations.json'));
      expect(bundled.basesOf('Just 6.5')).toEqual(['متری شیش نیم']);
    });
  });
});
