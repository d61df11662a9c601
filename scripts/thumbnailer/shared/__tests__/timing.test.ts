import { since } from '../timing';

describe('since', () => {
  it('should report tenths of a second by default', () => {
    expect(since(1_000, undefined, 3_460)).toBe(2.5);
  });

  it('should round to the requested precision', () => {
    expect(since(0, 0, 1_499)).toBe(1);
    expect(since(0, 2, 1_234)).toBe(1.23);
  });
});
