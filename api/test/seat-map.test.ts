import { describe, expect, it } from 'vitest';
import { SeatNotFoundError, SeatUnavailableError } from '../src/errors.js';
import {
  classForRow,
  DEFAULT_CLASS_RANGES,
  DEFAULT_ROW_COUNT,
  DEFAULT_SEAT_LETTERS,
  generateSeatMap,
  SeatMap
} from '../src/seat-map.js';
import { scriptedRandom } from './helpers/random.js';

const emptyAircraft = () =>
  generateSeatMap('AA123', DEFAULT_ROW_COUNT, DEFAULT_SEAT_LETTERS, DEFAULT_CLASS_RANGES, { availableRatio: 1 });

describe('generateSeatMap', () => {
  it('lays out 30 rows of six seats with classes by row range', () => {
    const seatMap = emptyAircraft();
    expect(seatMap.seats).toHaveLength(180);
    expect(seatMap.availableCount()).toBe(180);
    expect(seatMap.rows[0].seats.map((s) => s.seatNumber)).toEqual(['1A', '1B', '1C', '1D', '1E', '1F']);
    expect(seatMap.seat('2F').seatClass).toBe('First');
    expect(seatMap.seat('3A').seatClass).toBe('Business');
    expect(seatMap.seat('12C').seatClass).toBe('PremiumEconomy');
    expect(seatMap.seat('13A').seatClass).toBe('Economy');
    expect(seatMap.seat('30F').seatClass).toBe('Economy');
  });

  it('draws initial availability from the random source', () => {
    const seatMap = generateSeatMap('AA123', DEFAULT_ROW_COUNT, DEFAULT_SEAT_LETTERS, DEFAULT_CLASS_RANGES, {
      random: scriptedRandom([0, 9999]),
      availableRatio: 0.7
    });
    expect(seatMap.availableCount()).toBe(90);
    expect(seatMap.isAvailable('1A')).toBe(true);
    expect(seatMap.isAvailable('1B')).toBe(false);
  });

  it('starts fully booked at ratio 0', () => {
    const seatMap = generateSeatMap('AA123', 2, ['A', 'B'], DEFAULT_CLASS_RANGES, { availableRatio: 0 });
    expect(seatMap.availableCount()).toBe(0);
  });

  it('falls back to Economy for rows outside every range', () => {
    expect(classForRow(40, DEFAULT_CLASS_RANGES)).toBe('Economy');
  });
});

describe('SeatMap', () => {
  it('reserves a seat once', () => {
    const seatMap = emptyAircraft();
    seatMap.reserve('14A');
    expect(seatMap.isAvailable('14A')).toBe(false);
    expect(() => seatMap.reserve('14A')).toThrow(SeatUnavailableError);
  });

  it('normalizes seat numbers', () => {
    const seatMap = emptyAircraft();
    expect(seatMap.reserve(' 14a ').seatNumber).toBe('14A');
  });

  it('rejects unknown seats', () => {
    const seatMap = emptyAircraft();
    expect(() => seatMap.isAvailable('99Z')).toThrow(SeatNotFoundError);
    expect(() => seatMap.reserve('99Z')).toThrow('Seat 99Z does not exist on this flight');
    expect(() => seatMap.release('31A')).toThrow(SeatNotFoundError);
  });

  it('releases a reserved seat', () => {
    const seatMap = emptyAircraft();
    seatMap.reserve('3B');
    seatMap.release('3B');
    expect(seatMap.isAvailable('3B')).toBe(true);
  });

  it('finds the first free seat of a class in row then letter order', () => {
    const seatMap = emptyAircraft();
    seatMap.reserve('3A');
    expect(seatMap.firstAvailable('Business')?.seatNumber).toBe('3B');
  });

  it('keeps availability through a snapshot', () => {
    const seatMap = emptyAircraft();
    seatMap.reserve('7C');
    const copy = SeatMap.fromSnapshot(seatMap.toSnapshot());
    expect(copy.isAvailable('7C')).toBe(false);
    expect(copy.availableCount()).toBe(179);
  });

  it('refuses duplicate seat numbers', () => {
    const seat = { seatNumber: '1A', rowNumber: 1, letter: 'A', seatClass: 'First' as const, isAvailable: true };
    expect(() => new SeatMap('AA123', [{ rowNumber: 1, seats: [seat, { ...seat }] }])).toThrow(
      'Duplicate seat 1A in seat map for AA123'
    );
  });
});
