import pg from 'pg';
import { vi } from 'vitest';

export type SqlCall = { sql: string; values: unknown[] };
export type SqlReply = { rows?: pg.QueryResultRow[]; rowCount?: number } | Error;
/** Answers one statement; `undefined` means an empty result. */
export type SqlScript = (call: SqlCall) => SqlReply | undefined;

const normalize = (sql: string) => sql.replace(/\s+/g, ' ').trim();

/**
 * A real `pg.Pool` that never touches the network: `connect()` hands out one
 * client and every statement on either is answered by `script`.
 */
export function scriptedPool(script: SqlScript) {
  const calls: SqlCall[] = [];

  const run = async (text: unknown, values?: unknown): Promise<pg.QueryResult<pg.QueryResultRow>> => {
    const call: SqlCall = {
      sql: typeof text === 'string' ? normalize(text) : '',
      values: Array.isArray(values) ? values : []
    };
    calls.push(call);
    const reply: SqlReply = script(call) ?? {};
    if (reply instanceof Error) {
      throw reply;
    }
    const rows = reply.rows ?? [];
    return { command: call.sql.split(' ')[0], rowCount: reply.rowCount ?? rows.length, oid: 0, rows, fields: [] };
  };

  const client = Object.assign(new pg.Client(), { release: vi.fn() });
  vi.spyOn(client, 'query').mockImplementation(run);

  const pool = new pg.Pool();
  vi.spyOn(pool, 'connect').mockImplementation(async () => client);
  const poolQuery = vi.spyOn(pool, 'query').mockImplementation(run);

  return {
    pool,
    client,
    calls,
    poolQuery,
    /** First two words of every statement, in order. */
    statements: () => calls.map((call) => call.sql.split(' ').slice(0, 2).join(' '))
  };
}

export function uniqueViolation(constraint: string): pg.DatabaseError {
  const err = new pg.DatabaseError('duplicate key value violates unique constraint', 0, 'error');
  err.code = '23505';
  err.constraint = constraint;
  return err;
}

/**
 * Just enough of the bookings, passengers and seats tables to answer the
 * statements the booking store issues. Seats can be booked once.
 */
export function bookingTables() {
  const bookings = new Map<number, pg.QueryResultRow>();
  const passengers: pg.QueryResultRow[] = [];
  const bookedSeats = new Set<string>();
  let nextId = 41;

  const script: SqlScript = ({ sql, values }) => {
    if (sql.startsWith('INSERT INTO bookings')) {
      const id = nextId++;
      bookings.set(id, {
        booking_id: id,
        confirmation_number: values[0],
        user_id: values[1],
        flight_id: values[2],
        status: values[3],
        total_amount: values[4],
        payment_status: values[5],
        payment_transaction_id: values[6],
        created_at: values[7],
        updated_at: values[7]
      });
      return { rows: [{ booking_id: id }] };
    }
    if (sql.startsWith('UPDATE seats')) {
      const seat = `${String(values[0])}/${String(values[1])}`;
      if (bookedSeats.has(seat)) {
        return { rowCount: 0 };
      }
      bookedSeats.add(seat);
      return { rowCount: 1 };
    }
    if (sql.startsWith('INSERT INTO passengers')) {
      passengers.push({
        booking_id: values[0],
        passenger_id: 100 + passengers.length,
        first_name: values[2],
        last_name: values[3],
        date_of_birth: values[4],
        seat_number: values[5],
        seat_class: values[6],
        checked_in: false,
        check_in_time: null
      });
      return {};
    }
    if (sql.includes('FROM bookings WHERE booking_id')) {
      const row = bookings.get(Number(values[0]));
      return { rows: row ? [row] : [] };
    }
    if (sql.includes('FROM passengers WHERE booking_id=$1 ORDER BY')) {
      return { rows: passengers.filter((p) => p.booking_id === values[0]) };
    }
    return undefined;
  };

  return { script, bookedSeats };
}
