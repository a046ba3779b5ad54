import { describe, expect, it } from 'vitest';
import { priceFor } from '../src/fare.js';

describe('priceFor', () => {
  it('prices an economy and a business passenger at 1049.97', () => {
    expect(priceFor([{ seatClass: 'Economy' }, { seatClass: 'Business' }]).toFixed(2)).toBe('1049.97');
  });

  it('applies the first class multiplier', () => {
    expect(priceFor([{ seatClass: 'First' }]).toFixed(2)).toBe('1199.96');
  });

  it('rounds once on the total rather than per passenger', () => {
    const party = [{ seatClass: 'PremiumEconomy' as const }, { seatClass: 'PremiumEconomy' as const }, { seatClass: 'PremiumEconomy' as const }];
    expect(priceFor(party).toFixed(2)).toBe('1349.96');
  });

  it('rounds half up to cents', () => {
    expect(priceFor([{ seatClass: 'PremiumEconomy' }]).toFixed(2)).toBe('449.99');
  });

  it('returns zero for an empty party', () => {
    expect(priceFor([]).isZero()).toBe(true);
  });

  it('uses a configured base fare', () => {
    expect(priceFor([{ seatClass: 'Economy' }, { seatClass: 'First' }], '100').toFixed(2)).toBe('500.00');
  });
});
