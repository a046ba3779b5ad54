import { Decimal } from 'decimal.js';
import type { SeatClass } from './types.js';

export const DEFAULT_BASE_FARE = '299.99';

export const FARE_MULTIPLIERS: Record<SeatClass, Decimal> = {
  Economy: new Decimal('1.0'),
  PremiumEconomy: new Decimal('1.5'),
  Business: new Decimal('2.5'),
  First: new Decimal('4.0')
};

/**
 * Total fare for a party: base fare times the class multiplier, summed per
 * passenger and rounded half-up to cents once at the end. An empty party
 * costs 0.
 */
export function priceFor(
  passengers: ReadonlyArray<{ seatClass: SeatClass }>,
  baseFare: Decimal.Value = DEFAULT_BASE_FARE
): Decimal {
  const base = new Decimal(baseFare);
  const total = passengers.reduce(
    (sum, passenger) => sum.plus(base.times(FARE_MULTIPLIERS[passenger.seatClass])),
    new Decimal(0)
  );
  return total.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}
