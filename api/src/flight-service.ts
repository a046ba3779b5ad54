import type pg from 'pg';
import { FLIGHT_STATUSES, type FlightInstance, type FlightStatus } from './types.js';

export type FlightBoardFilters = {
  search?: string;
  status?: FlightStatus;
  airline?: string;
};

/** Flight data as seen by the booking core. Dates are UTC `YYYY-MM-DD`. */
export interface FlightDirectory {
  getFlightInstance(flightNumber: string, date: string): Promise<FlightInstance | null>;
  getFlightById(flightId: number): Promise<FlightInstance | null>;
  getFlightBoard(airport: string, filters?: FlightBoardFilters): Promise<FlightInstance[]>;
  listUpcoming(limit: number): Promise<FlightInstance[]>;
  updateStatus(flightId: number, status: FlightStatus): Promise<void>;
  updateGate(flightId: number, gate: string, terminal?: string): Promise<void>;
  applyDelay(flightId: number, minutes: number): Promise<void>;
}

export const toFlightDate = (at: Date) => at.toISOString().slice(0, 10);

export const isFlightDate = (value: string) =>
  /^\d{4}-\d{2}-\d{2}$/.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00Z`));

export const normalizeFlightNumber = (flightNumber: string) => flightNumber.trim().toUpperCase();

export function isFlightStatus(value: string): value is FlightStatus {
  return FLIGHT_STATUSES.some((status) => status === value);
}

export function filterFlights(flights: FlightInstance[], filters: FlightBoardFilters = {}): FlightInstance[] {
  const search = filters.search?.trim().toLowerCase();
  const airline = filters.airline?.trim().toLowerCase();
  return flights.filter((flight) => {
    if (search) {
      const haystack = [flight.flightNumber, flight.airline, flight.originAirport, flight.destinationAirport];
      if (!haystack.some((field) => field.toLowerCase().includes(search))) {
        return false;
      }
    }
    if (filters.status && flight.status !== filters.status) {
      return false;
    }
    if (airline && !flight.airline.toLowerCase().includes(airline)) {
      return false;
    }
    return true;
  });
}

type FlightRow = {
  flight_id: number;
  flight_number: string;
  airline: string;
  origin_airport: string;
  destination_airport: string;
  scheduled_departure: Date;
  estimated_departure: Date | null;
  scheduled_arrival: Date;
  estimated_arrival: Date | null;
  status: string;
  gate: string | null;
  terminal: string | null;
  aircraft: string | null;
};

const FLIGHT_COLUMNS = `flight_id, flight_number, airline, origin_airport, destination_airport,
  scheduled_departure, estimated_departure, scheduled_arrival, estimated_arrival,
  status, gate, terminal, aircraft`;

export function mapFlightRow(row: FlightRow): FlightInstance {
  if (!isFlightStatus(row.status)) {
    throw new Error(`Flight ${row.flight_id} has unknown status ${row.status}`);
  }
  return {
    id: row.flight_id,
    flightNumber: row.flight_number,
    airline: row.airline,
    originAirport: row.origin_airport.trim(),
    destinationAirport: row.destination_airport.trim(),
    scheduledDeparture: row.scheduled_departure,
    estimatedDeparture: row.estimated_departure,
    scheduledArrival: row.scheduled_arrival,
    estimatedArrival: row.estimated_arrival,
    status: row.status,
    gate: row.gate,
    terminal: row.terminal,
    aircraft: row.aircraft
  };
}

export class PgFlightDirectory implements FlightDirectory {
  constructor(private readonly db: pg.Pool) {}

  async getFlightInstance(flightNumber: string, date: string): Promise<FlightInstance | null> {
    const { rows } = await this.db.query<FlightRow>(
      `SELECT ${FLIGHT_COLUMNS} FROM flights
       WHERE flight_number=$1 AND (scheduled_departure AT TIME ZONE 'UTC')::date = $2::date
       LIMIT 1`,
      [normalizeFlightNumber(flightNumber), date]
    );
    return rows.length > 0 ? mapFlightRow(rows[0]) : null;
  }

  async getFlightById(flightId: number): Promise<FlightInstance | null> {
    const { rows } = await this.db.query<FlightRow>(`SELECT ${FLIGHT_COLUMNS} FROM flights WHERE flight_id=$1`, [
      flightId
    ]);
    return rows.length > 0 ? mapFlightRow(rows[0]) : null;
  }

  async getFlightBoard(airport: string, filters: FlightBoardFilters = {}): Promise<FlightInstance[]> {
    const { rows } = await this.db.query<FlightRow>(
      `SELECT ${FLIGHT_COLUMNS} FROM flights
       WHERE (origin_airport=$1 OR destination_airport=$1)
         AND scheduled_departure BETWEEN now() - interval '6 hours' AND now() + interval '48 hours'
       ORDER BY scheduled_departure`,
      [airport.toUpperCase()]
    );
    return filterFlights(rows.map(mapFlightRow), filters);
  }

  async listUpcoming(limit: number): Promise<FlightInstance[]> {
    const { rows } = await this.db.query<FlightRow>(
      `SELECT ${FLIGHT_COLUMNS} FROM flights
       WHERE status NOT IN ('Arrived','Cancelled')
       ORDER BY scheduled_departure
       LIMIT $1`,
      [limit]
    );
    return rows.map(mapFlightRow);
  }

  async updateStatus(flightId: number, status: FlightStatus): Promise<void> {
    await this.db.query('UPDATE flights SET status=$2, updated_at=now() WHERE flight_id=$1', [flightId, status]);
  }

  async updateGate(flightId: number, gate: string, terminal?: string): Promise<void> {
    await this.db.query(
      'UPDATE flights SET gate=$2, terminal=COALESCE($3, terminal), updated_at=now() WHERE flight_id=$1',
      [flightId, gate, terminal ?? null]
    );
  }

  async applyDelay(flightId: number, minutes: number): Promise<void> {
    await this.db.query(
      `UPDATE flights
       SET estimated_departure = COALESCE(estimated_departure, scheduled_departure) + make_interval(mins => $2::int),
           estimated_arrival = COALESCE(estimated_arrival, scheduled_arrival) + make_interval(mins => $2::int),
           status = 'Delayed', updated_at = now()
       WHERE flight_id=$1`,
      [flightId, minutes]
    );
  }
}
