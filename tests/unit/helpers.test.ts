import {
  calculateAccuracy,
  calculateTier,
  calculateXp,
  canonicalLetter,
  roundTo,
  sampleWithoutReplacement,
} from '../../src/utils/helpers';
import { seededRandom } from '../utils/fakes';

describe('scoring helpers', () => {
  it('rounds accuracy to two decimals', () => {
    expect(calculateAccuracy(4, 5)).toBe(80);
    expect(calculateAccuracy(2, 3)).toBe(66.67);
    expect(calculateAccuracy(1, 3)).toBe(33.33);
    expect(calculateAccuracy(5, 5)).toBe(100);
  });

  it('reports zero accuracy when nothing was attempted', () => {
    expect(calculateAccuracy(0, 0)).toBe(0);
  });

  it('awards 10 xp per correct answer', () => {
    expect(calculateXp(0)).toBe(0);
    expect(calculateXp(4)).toBe(40);
  });

  it('roundTo honours the requested precision', () => {
    expect(roundTo(2.5, 0)).toBe(3);
    expect(roundTo(12.3456, 1)).toBe(12.3);
  });

  it.each([
    { correct: 5, total: 5, tier: 'perfect' },
    { correct: 1, total: 1, tier: 'perfect' },
    { correct: 4, total: 5, tier: 'near_perfect' },
    { correct: 1, total: 2, tier: 'near_perfect' },
    { correct: 3, total: 5, tier: 'good' },
    { correct: 2, total: 4, tier: 'good' },
    { correct: 2, total: 5, tier: 'encourage' },
    { correct: 0, total: 1, tier: 'encourage' },
    { correct: 0, total: 2, tier: 'encourage' },
  ])('$correct of $total correct is $tier', ({ correct, total, tier }) => {
    expect(calculateTier(correct, total)).toBe(tier);
  });

  it('takes the first character of the stored answer, upper-cased', () => {
    expect(canonicalLetter(' b ')).toBe('B');
    expect(canonicalLetter('A. Newton')).toBe('A');
    expect(canonicalLetter('')).toBe('');
  });
});

describe('sampleWithoutReplacement', () => {
  it('shuffles with the given random source then takes the first n', () => {
    expect(sampleWithoutReplacement([1, 2, 3, 4], 2, () => 0)).toEqual([2, 3]);
  });

  it('returns everything when fewer items than requested exist', () => {
    const sample = sampleWithoutReplacement(['a', 'b', 'c'], 10, seededRandom(7));
    expect(sample).toHaveLength(3);
    expect([...sample].sort()).toEqual(['a', 'b', 'c']);
  });

  it('never repeats an item', () => {
    const items = Array.from({ length: 50 }, (_, i) => i);
    const sample = sampleWithoutReplacement(items, 20, seededRandom(123));
    expect(new Set(sample).size).toBe(20);
  });

  it('is reproducible for the same seed', () => {
    const items = Array.from({ length: 30 }, (_, i) => `q${i}`);
    expect(sampleWithoutReplacement(items, 5, seededRandom(99))).toEqual(
      sampleWithoutReplacement(items, 5, seededRandom(99))
    );
  });

  it('leaves the input untouched', () => {
    const items = [1, 2, 3];
    sampleWithoutReplacement(items, 3, () => 0);
    expect(items).toEqual([1, 2, 3]);
  });
});
