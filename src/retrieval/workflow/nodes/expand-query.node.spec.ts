import { selectAlternativeIndex } from './expand-query.node';

describe('selectAlternativeIndex', () => {
  it('starts from the first alternative after empty results', () => {
    expect(selectAlternativeIndex('empty_results', 3, 4)).toBe(0);
  });

  it('walks the alternatives on low quality', () => {
    expect(selectAlternativeIndex('low_quality', 1, 3)).toBe(0);
    expect(selectAlternativeIndex('low_quality', 2, 3)).toBe(1);
  });

  it('stays on the last alternative once they run out', () => {
    expect(selectAlternativeIndex('low_quality', 5, 2)).toBe(1);
  });
});
