import { SeatNotFoundError, SeatUnavailableError } from './errors.js';
import { chance, cryptoRandom, type RandomSource } from './random.js';
import type { SeatClass } from './types.js';

export type Seat = {
  seatNumber: string;
  rowNumber: number;
  letter: string;
  seatClass: SeatClass;
  isAvailable: boolean;
};

export type SeatRow = {
  rowNumber: number;
  seats: Seat[];
};

export type ClassRange = {
  seatClass: SeatClass;
  fromRow: number;
  toRow: number;
};

export type SeatMapSnapshot = {
  flightNumber: string;
  rows: SeatRow[];
};

export const DEFAULT_ROW_COUNT = 30;
export const DEFAULT_SEAT_LETTERS = ['A', 'B', 'C', 'D', 'E', 'F'] as const;
export const DEFAULT_CLASS_RANGES: readonly ClassRange[] = [
  { seatClass: 'First', fromRow: 1, toRow: 2 },
  { seatClass: 'Business', fromRow: 3, toRow: 6 },
  { seatClass: 'PremiumEconomy', fromRow: 7, toRow: 12 },
  { seatClass: 'Economy', fromRow: 13, toRow: DEFAULT_ROW_COUNT }
];

export const normalizeSeatNumber = (seatNumber: string) => seatNumber.trim().toUpperCase();

/**
 * Seat inventory of a single flight instance. Mutations are synchronous, so a
 * reserve is atomic with respect to other callers sharing the same instance.
 */
export class SeatMap {
  private readonly index = new Map<string, Seat>();

  constructor(
    readonly flightNumber: string,
    readonly rows: SeatRow[]
  ) {
    for (const row of rows) {
      for (const seat of row.seats) {
        if (this.index.has(seat.seatNumber)) {
          throw new Error(`Duplicate seat ${seat.seatNumber} in seat map for ${flightNumber}`);
        }
        this.index.set(seat.seatNumber, seat);
      }
    }
  }

  static fromSeats(flightNumber: string, seats: Seat[]): SeatMap {
    const byRow = new Map<number, Seat[]>();
    for (const seat of seats) {
      const row = byRow.get(seat.rowNumber) ?? [];
      row.push({ ...seat });
      byRow.set(seat.rowNumber, row);
    }
    const rows = [...byRow.entries()]
      .sort(([a], [b]) => a - b)
      .map(([rowNumber, rowSeats]) => ({
        rowNumber,
        seats: rowSeats.sort((a, b) => a.letter.localeCompare(b.letter))
      }));
    return new SeatMap(flightNumber, rows);
  }

  static fromSnapshot(snapshot: SeatMapSnapshot): SeatMap {
    return SeatMap.fromSeats(
      snapshot.flightNumber,
      snapshot.rows.flatMap((row) => row.seats)
    );
  }

  get seats(): Seat[] {
    return this.rows.flatMap((row) => row.seats);
  }

  has(seatNumber: string): boolean {
    return this.index.has(normalizeSeatNumber(seatNumber));
  }

  seat(seatNumber: string): Seat {
    const seat = this.index.get(normalizeSeatNumber(seatNumber));
    if (!seat) {
      throw new SeatNotFoundError(seatNumber);
    }
    return seat;
  }

  isAvailable(seatNumber: string): boolean {
    return this.seat(seatNumber).isAvailable;
  }

  reserve(seatNumber: string): Seat {
    const seat = this.seat(seatNumber);
    if (!seat.isAvailable) {
      throw new SeatUnavailableError(seat.seatNumber);
    }
    seat.isAvailable = false;
    return seat;
  }

  release(seatNumber: string): Seat {
    const seat = this.seat(seatNumber);
    seat.isAvailable = true;
    return seat;
  }

  firstAvailable(seatClass: SeatClass): Seat | undefined {
    return this.seats.find((seat) => seat.seatClass === seatClass && seat.isAvailable);
  }

  availableCount(): number {
    return this.seats.filter((seat) => seat.isAvailable).length;
  }

  toSnapshot(): SeatMapSnapshot {
    return {
      flightNumber: this.flightNumber,
      rows: this.rows.map((row) => ({
        rowNumber: row.rowNumber,
        seats: row.seats.map((seat) => ({ ...seat }))
      }))
    };
  }
}

export type GenerateSeatMapOptions = {
  random?: RandomSource;
  /** Probability that a seat starts out available. */
  availableRatio?: number;
};

export function classForRow(rowNumber: number, classRanges: readonly ClassRange[]): SeatClass {
  const range = classRanges.find((r) => rowNumber >= r.fromRow && rowNumber <= r.toRow);
  return range ? range.seatClass : 'Economy';
}

export function generateSeatMap(
  flightNumber: string,
  rowCount: number = DEFAULT_ROW_COUNT,
  seatLetters: readonly string[] = DEFAULT_SEAT_LETTERS,
  classRanges: readonly ClassRange[] = DEFAULT_CLASS_RANGES,
  options: GenerateSeatMapOptions = {}
): SeatMap {
  const random = options.random ?? cryptoRandom;
  const availableRatio = options.availableRatio ?? 0.7;
  const rows: SeatRow[] = [];
  for (let rowNumber = 1; rowNumber <= rowCount; rowNumber++) {
    const seatClass = classForRow(rowNumber, classRanges);
    rows.push({
      rowNumber,
      seats: seatLetters.map((letter) => ({
        seatNumber: `${rowNumber}${letter}`,
        rowNumber,
        letter,
        seatClass,
        isAvailable: chance(random, availableRatio)
      }))
    });
  }
  return new SeatMap(flightNumber, rows);
}
