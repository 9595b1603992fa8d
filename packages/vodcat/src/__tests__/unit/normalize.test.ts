import { normalize, STOP_WORDS } from '../../matching/normalize.js';

describe('normalize', () => {
  it('returns an empty key for missing or blank input', () => {
    expect(normalize(undefined)).toBe('');
    expect(normalize(null)).toBe('');
    expect(normalize('   ')).toBe('');
  });

  it('lowercases, strips punctuation and collapses whitespace', () => {
    expect(normalize('  Spider-Man:   No Way Home! ')).toBe('spider man no way home');
  });

  it('drops English stop words', () => {
    expect(normalize('The Lord of the Rings')).toBe('lord rings');
  });

  it('drops Persian prepositions and conjunctions', () => {
    expect(normalize('سفر در زمان')).toBe('سفر زمان');
    expect(normalize('متری شیش و نیم')).toBe('متری شیش نیم');
  });

  it('folds full-width forms through NFKC', () => {
    expect(normalize('Ｉｎｃｅｐｔｉｏｎ')).toBe('inception');
  });

  it('unifies Arabic yeh and kaf with the Persian letters', () => {
    expect(normalize('علي')).toBe(normalize('علی'));
    expect(normalize('كتاب')).toBe('کتاب');
  });

  it('keeps digits', () => {
    expect(normalize('Just 6.5')).toBe('just 6 5');
  });

  it('yields an empty key for punctuation or stop words only', () => {
    expect(normalize('!!! ???')).toBe('');
    expect(normalize('The And Of')).toBe('');
  });

  it('gives case, punctuation and leading-article variants the same key', () => {
    const keys = [normalize('The Matrix!'), normalize('the matrix'), normalize('Matrix')];
    expect(keys).toEqual(['matrix', 'matrix', 'matrix']);
    expect(normalize('')).toBe('');
  });

  it('maps spelling variants of one title to one key', () => {
    const variants = ['Inception', 'INCEPTION', 'inception.', '  Inception  '];
    expect(new Set(variants.map(normalize))).toEqual(new Set(['inception']));
  });

  it('exposes the stop word list', () => {
    expect(STOP_WORDS.has('the')).toBe(true);
    expect(STOP_WORDS.has('و')).toBe(true);
    expect(STOP_WORDS.has('drive')).toBe(false);
  });
});
