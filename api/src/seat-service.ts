import type pg from 'pg';
import type { JsonCache } from './cache.js';
import { withTransaction } from './db.js';
import { cryptoRandom, type RandomSource } from './random.js';
import {
  DEFAULT_CLASS_RANGES,
  DEFAULT_ROW_COUNT,
  DEFAULT_SEAT_LETTERS,
  generateSeatMap,
  SeatMap,
  type Seat,
  type SeatMapSnapshot
} from './seat-map.js';
import { parseEnum, SEAT_CLASSES, type FlightInstance, type SeatClass } from './types.js';

export type SeatState = 'AVAILABLE' | 'BOOKED' | 'BLOCKED';

/** Read side of the persistent seat inventory. */
export interface SeatInventory {
  getSeatMap(flight: FlightInstance): Promise<SeatMap>;
}

export type SeatRecord = {
  flight_id: number;
  seat_number: string;
  row_number: number;
  seat_letter: string;
  seat_class: string;
  state: SeatState;
  booking_id: number | null;
};

export type PgSeatInventoryOptions = {
  random?: RandomSource;
  availableRatio: number;
  cacheTtlSeconds: number;
};

export const seatMapCacheKey = (flightId: number) => `seatmap:${flightId}`;

function toSeat(row: SeatRecord): Seat {
  return {
    seatNumber: row.seat_number,
    rowNumber: row.row_number,
    letter: row.seat_letter.trim(),
    seatClass: parseEnum(SEAT_CLASSES, row.seat_class, 'seat class'),
    isAvailable: row.state === 'AVAILABLE'
  };
}

export class PgSeatInventory implements SeatInventory {
  private readonly random: RandomSource;

  constructor(
    private readonly db: pg.Pool,
    private readonly cache: JsonCache,
    private readonly options: PgSeatInventoryOptions
  ) {
    this.random = options.random ?? cryptoRandom;
  }

  async getSeatMap(flight: FlightInstance): Promise<SeatMap> {
    const cached = await this.cache.get<SeatMapSnapshot>(seatMapCacheKey(flight.id));
    if (cached) {
      return SeatMap.fromSnapshot(cached);
    }
    return this.refresh(flight);
  }

  /** Rebuilds the cached snapshot from the table. */
  async refresh(flight: FlightInstance): Promise<SeatMap> {
    await this.ensureProvisioned(flight);
    const { rows } = await this.db.query<SeatRecord>(
      `SELECT flight_id, seat_number, row_number, seat_letter, seat_class, state, booking_id
       FROM seats WHERE flight_id=$1 ORDER BY row_number, seat_letter`,
      [flight.id]
    );
    const seatMap = SeatMap.fromSeats(flight.flightNumber, rows.map(toSeat));
    await this.cache.set(seatMapCacheKey(flight.id), seatMap.toSnapshot(), this.options.cacheTtlSeconds);
    return seatMap;
  }

  async invalidate(flightId: number): Promise<void> {
    await this.cache.del(seatMapCacheKey(flightId));
  }

  /**
   * Seats are created the first time a flight's map is needed. The advisory
   * lock keeps two first readers from provisioning the same flight twice.
   */
  async ensureProvisioned(flight: FlightInstance): Promise<void> {
    await withTransaction(this.db, async (client) => {
      await client.query('SELECT pg_advisory_xact_lock($1)', [flight.id]);
      const existing = await client.query('SELECT 1 FROM seats WHERE flight_id=$1 LIMIT 1', [flight.id]);
      if ((existing.rowCount ?? 0) > 0) {
        return;
      }
      const seats = generateSeatMap(
        flight.flightNumber,
        DEFAULT_ROW_COUNT,
        DEFAULT_SEAT_LETTERS,
        DEFAULT_CLASS_RANGES,
        { random: this.random, availableRatio: this.options.availableRatio }
      ).seats;
      await client.query(
        `INSERT INTO seats (flight_id, seat_number, row_number, seat_letter, seat_class, state)
         SELECT $1, s.seat_number, s.row_number, s.seat_letter, s.seat_class, s.state
         FROM unnest($2::text[], $3::int[], $4::text[], $5::text[], $6::text[])
           AS s(seat_number, row_number, seat_letter, seat_class, state)
         ON CONFLICT DO NOTHING`,
        [
          flight.id,
          seats.map((s) => s.seatNumber),
          seats.map((s) => s.rowNumber),
          seats.map((s) => s.letter),
          seats.map((s) => s.seatClass),
          seats.map((s): SeatState => (s.isAvailable ? 'AVAILABLE' : 'BLOCKED'))
        ]
      );
    });
  }
}

/**
 * Marks a seat booked only if it is still available. Runs on the caller's
 * transaction so the reservation commits or rolls back with the booking.
 */
export async function reserveSeat(
  client: pg.PoolClient,
  flightId: number,
  seatNumber: string,
  bookingId: number,
  actor: string
): Promise<boolean> {
  const res = await client.query(
    `UPDATE seats
     SET state='BOOKED', booking_id=$3, version=version+1, updated_at=now()
     WHERE flight_id=$1 AND seat_number=$2 AND state='AVAILABLE'`,
    [flightId, seatNumber, bookingId]
  );
  if (res.rowCount === 0) {
    return false;
  }
  await insertSeatEvent(client, flightId, seatNumber, 'RESERVED', actor, { bookingId });
  return true;
}

export async function assignFirstAvailableSeat(
  client: pg.PoolClient,
  flightId: number,
  seatClass: SeatClass,
  bookingId: number,
  actor: string
): Promise<string | null> {
  const res = await client.query<{ seat_number: string }>(
    `UPDATE seats
     SET state='BOOKED', booking_id=$3, version=version+1, updated_at=now()
     WHERE flight_id=$1 AND seat_number = (
       SELECT seat_number FROM seats
       WHERE flight_id=$1 AND seat_class=$2 AND state='AVAILABLE'
       ORDER BY row_number, seat_letter
       LIMIT 1
       FOR UPDATE SKIP LOCKED
     )
     RETURNING seat_number`,
    [flightId, seatClass, bookingId]
  );
  if (res.rows.length === 0) {
    return null;
  }
  const seatNumber = res.rows[0].seat_number;
  await insertSeatEvent(client, flightId, seatNumber, 'ASSIGNED_AT_CHECKIN', actor, { bookingId });
  return seatNumber;
}

export async function releaseBookingSeats(
  client: pg.PoolClient,
  bookingId: number,
  actor: string,
  reason: string
): Promise<string[]> {
  const res = await client.query<{ flight_id: number; seat_number: string }>(
    `UPDATE seats
     SET state='AVAILABLE', booking_id=NULL, version=version+1, updated_at=now()
     WHERE booking_id=$1
     RETURNING flight_id, seat_number`,
    [bookingId]
  );
  for (const row of res.rows) {
    await insertSeatEvent(client, row.flight_id, row.seat_number, 'RELEASED', actor, { bookingId, reason });
  }
  return res.rows.map((row) => row.seat_number);
}

async function insertSeatEvent(
  client: pg.PoolClient,
  flightId: number,
  seatNumber: string,
  eventType: string,
  actor?: string,
  metadata?: Record<string, unknown>
) {
  await client.query(
    'INSERT INTO seat_events(flight_id, seat_number, event_type, actor, metadata) VALUES ($1,$2,$3,$4,$5)',
    [flightId, seatNumber, eventType, actor || null, metadata || {}]
  );
}
