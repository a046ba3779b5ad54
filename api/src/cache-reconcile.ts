import type pg from 'pg';
import type { FlightDirectory } from './flight-service.js';
import type { PgSeatInventory } from './seat-service.js';

/** Rebuilds the cached seat map of every provisioned flight that has not departed. */
export async function reconcileSeatMaps(db: pg.Pool, flights: FlightDirectory, seats: PgSeatInventory) {
  const res = await db.query<{ flight_id: number }>(
    `SELECT DISTINCT s.flight_id FROM seats s
     JOIN flights f ON f.flight_id = s.flight_id
     WHERE f.scheduled_departure > now()`
  );
  let rebuilt = 0;
  for (const row of res.rows) {
    const flight = await flights.getFlightById(row.flight_id);
    if (flight) {
      await seats.refresh(flight);
      rebuilt += 1;
    }
  }
  return rebuilt;
}
