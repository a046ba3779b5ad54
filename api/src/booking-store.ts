import { Decimal } from 'decimal.js';
import type pg from 'pg';
import { statusesLeadingTo } from './booking-state.js';
import { isUniqueViolation, withClient, withTransaction } from './db.js';
import { DuplicateCodeError, InvalidBookingStateError, SeatUnavailableError } from './errors.js';
import type { Logger } from './logger.js';
import { releaseBookingSeats, reserveSeat, assignFirstAvailableSeat } from './seat-service.js';
import {
  BAGGAGE_STATUSES,
  BAGGAGE_TYPES,
  BOOKING_STATUSES,
  parseEnum,
  PAYMENT_STATUSES,
  SEAT_CLASSES,
  type BaggageItem,
  type Booking,
  type BookingStatus,
  type Passenger,
  type PassengerInput,
  type PaymentStatus
} from './types.js';

export type NewPassenger = PassengerInput & { seatNumber: string | null };

export type NewBooking = {
  confirmationNumber: string;
  userId: string;
  flightId: number;
  status: BookingStatus;
  paymentStatus: PaymentStatus;
  paymentTransactionId: string | null;
  totalAmount: Decimal;
  createdAt: Date;
  passengers: NewPassenger[];
};

/**
 * Persistence of the booking aggregate. Every method is one unit of work:
 * either all of its writes land or none do.
 */
export interface BookingStore {
  /**
   * Inserts the booking, its passengers and their seat reservations.
   * Throws `DuplicateCodeError` when the confirmation number is taken and
   * `SeatUnavailableError` when a selected seat was booked in the meantime.
   */
  insertBooking(booking: NewBooking): Promise<Booking>;
  findByConfirmation(confirmationNumber: string): Promise<Booking | null>;
  /**
   * Moves a Confirmed booking to CheckedIn, stamps every passenger and gives
   * seatless passengers the first free seat of their class, if any.
   */
  checkIn(bookingId: number, at: Date): Promise<Booking>;
  /** Moves the booking to Cancelled and releases its seats. */
  cancel(bookingId: number, at: Date): Promise<Booking>;
  setPaymentStatus(bookingId: number, status: PaymentStatus): Promise<void>;
  /** CheckedIn bookings on arrived flights become Completed. Returns the count. */
  completeArrived(): Promise<number>;
}

export const CONFIRMATION_CONSTRAINT = 'bookings_confirmation_number_key';

type BookingRow = {
  booking_id: number;
  confirmation_number: string;
  user_id: string;
  flight_id: number;
  status: string;
  total_amount: string;
  payment_status: string;
  payment_transaction_id: string | null;
  created_at: Date;
  updated_at: Date;
};

type PassengerRow = {
  passenger_id: number;
  first_name: string;
  last_name: string;
  date_of_birth: Date | null;
  seat_number: string | null;
  seat_class: string;
  checked_in: boolean;
  check_in_time: Date | null;
};

export type BaggageRow = {
  baggage_id: number;
  booking_id: number;
  tracking_number: string;
  baggage_type: string;
  weight_kg: string;
  status: string;
  created_at: Date;
  updated_at: Date;
};

export function mapBaggageRow(row: BaggageRow): BaggageItem {
  return {
    id: row.baggage_id,
    bookingId: row.booking_id,
    trackingNumber: row.tracking_number,
    type: parseEnum(BAGGAGE_TYPES, row.baggage_type, 'baggage type'),
    weightKg: Number(row.weight_kg),
    status: parseEnum(BAGGAGE_STATUSES, row.status, 'baggage status'),
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapPassengerRow(row: PassengerRow): Passenger {
  return {
    id: row.passenger_id,
    firstName: row.first_name,
    lastName: row.last_name,
    dateOfBirth: row.date_of_birth,
    seatNumber: row.seat_number,
    seatClass: parseEnum(SEAT_CLASSES, row.seat_class, 'seat class'),
    checkedIn: row.checked_in,
    checkInTime: row.check_in_time
  };
}

export class PgBookingStore implements BookingStore {
  constructor(
    private readonly db: pg.Pool,
    private readonly logger: Logger,
    private readonly onSeatsChanged: (flightId: number) => Promise<void>
  ) {}

  async insertBooking(booking: NewBooking): Promise<Booking> {
    let created: Booking;
    try {
      created = await withTransaction(this.db, async (client) => {
        const inserted = await client.query<{ booking_id: number }>(
          `INSERT INTO bookings (confirmation_number, user_id, flight_id, status, total_amount,
                                 payment_status, payment_transaction_id, created_at, updated_at)
           VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$8)
           RETURNING booking_id`,
          [
            booking.confirmationNumber,
            booking.userId,
            booking.flightId,
            booking.status,
            booking.totalAmount.toFixed(2),
            booking.paymentStatus,
            booking.paymentTransactionId,
            booking.createdAt
          ]
        );
        const id = inserted.rows[0].booking_id;

        for (const [position, passenger] of booking.passengers.entries()) {
          if (passenger.seatNumber) {
            const reserved = await reserveSeat(client, booking.flightId, passenger.seatNumber, id, booking.userId);
            if (!reserved) {
              throw new SeatUnavailableError(passenger.seatNumber);
            }
          }
          await client.query(
            `INSERT INTO passengers (booking_id, position, first_name, last_name, date_of_birth, seat_number, seat_class)
             VALUES ($1,$2,$3,$4,$5,$6,$7)`,
            [
              id,
              position,
              passenger.firstName,
              passenger.lastName,
              passenger.dateOfBirth ?? null,
              passenger.seatNumber,
              passenger.seatClass
            ]
          );
        }
        return loadBooking(client, id);
      });
    } catch (err) {
      if (isUniqueViolation(err, CONFIRMATION_CONSTRAINT)) {
        throw new DuplicateCodeError(booking.confirmationNumber);
      }
      throw err;
    }

    // committed from here on: nothing below may fail the insert
    if (booking.passengers.some((p) => p.seatNumber)) {
      await this.seatsChanged(booking.flightId);
    }
    return created;
  }

  async findByConfirmation(confirmationNumber: string): Promise<Booking | null> {
    const { rows } = await this.db.query<{ booking_id: number }>(
      'SELECT booking_id FROM bookings WHERE confirmation_number=$1',
      [confirmationNumber]
    );
    if (rows.length === 0) {
      return null;
    }
    return withClient(this.db, (client) => loadBooking(client, rows[0].booking_id));
  }

  async checkIn(bookingId: number, at: Date): Promise<Booking> {
    const { flightId, assigned, booking } = await withTransaction(this.db, async (client) => {
      const updated = await client.query<{ flight_id: number; user_id: string }>(
        `UPDATE bookings SET status='CheckedIn', updated_at=$2
         WHERE booking_id=$1 AND status = ANY($3::text[])
         RETURNING flight_id, user_id`,
        [bookingId, at, statusesLeadingTo('CheckedIn', BOOKING_STATUSES)]
      );
      if (updated.rows.length === 0) {
        throw new InvalidBookingStateError('This booking can no longer be checked in');
      }
      const { flight_id, user_id } = updated.rows[0];

      const seatless = await client.query<{ passenger_id: number; seat_class: string }>(
        'SELECT passenger_id, seat_class FROM passengers WHERE booking_id=$1 AND seat_number IS NULL ORDER BY position',
        [bookingId]
      );
      let assignedCount = 0;
      for (const passenger of seatless.rows) {
        const seatClass = parseEnum(SEAT_CLASSES, passenger.seat_class, 'seat class');
        const seatNumber = await assignFirstAvailableSeat(client, flight_id, seatClass, bookingId, user_id);
        if (seatNumber) {
          await client.query('UPDATE passengers SET seat_number=$2 WHERE passenger_id=$1', [
            passenger.passenger_id,
            seatNumber
          ]);
          assignedCount++;
        }
      }

      await client.query('UPDATE passengers SET checked_in=true, check_in_time=$2 WHERE booking_id=$1', [
        bookingId,
        at
      ]);
      return { flightId: flight_id, assigned: assignedCount, booking: await loadBooking(client, bookingId) };
    });

    if (assigned > 0) {
      await this.seatsChanged(flightId);
    }
    return booking;
  }

  async cancel(bookingId: number, at: Date): Promise<Booking> {
    const { flightId, released, booking } = await withTransaction(this.db, async (client) => {
      const updated = await client.query<{ flight_id: number; user_id: string }>(
        `UPDATE bookings SET status='Cancelled', updated_at=$2
         WHERE booking_id=$1 AND status = ANY($3::text[])
         RETURNING flight_id, user_id`,
        [bookingId, at, statusesLeadingTo('Cancelled', BOOKING_STATUSES)]
      );
      if (updated.rows.length === 0) {
        throw new InvalidBookingStateError('This booking can no longer be cancelled');
      }
      const seats = await releaseBookingSeats(client, bookingId, updated.rows[0].user_id, 'booking cancelled');
      return {
        flightId: updated.rows[0].flight_id,
        released: seats.length,
        booking: await loadBooking(client, bookingId)
      };
    });

    if (released > 0) {
      await this.seatsChanged(flightId);
    }
    return booking;
  }

  async setPaymentStatus(bookingId: number, status: PaymentStatus): Promise<void> {
    await this.db.query('UPDATE bookings SET payment_status=$2, updated_at=now() WHERE booking_id=$1', [
      bookingId,
      status
    ]);
  }

  async completeArrived(): Promise<number> {
    const res = await this.db.query(
      `UPDATE bookings b SET status='Completed', updated_at=now()
       FROM flights f
       WHERE b.flight_id=f.flight_id AND f.status='Arrived' AND b.status = ANY($1::text[])`,
      [statusesLeadingTo('Completed', BOOKING_STATUSES)]
    );
    const count = res.rowCount ?? 0;
    if (count > 0) {
      this.logger.info({ count }, 'Bookings completed after arrival');
    }
    return count;
  }

  private async seatsChanged(flightId: number): Promise<void> {
    try {
      await this.onSeatsChanged(flightId);
    } catch (err) {
      this.logger.warn({ err, flightId }, 'Seat map refresh failed after commit');
    }
  }
}

async function loadBooking(client: pg.PoolClient, bookingId: number): Promise<Booking> {
  const bookingRes = await client.query<BookingRow>(
    `SELECT booking_id, confirmation_number, user_id, flight_id, status, total_amount,
            payment_status, payment_transaction_id, created_at, updated_at
     FROM bookings WHERE booking_id=$1`,
    [bookingId]
  );
  if (bookingRes.rows.length === 0) {
    throw new Error(`Booking ${bookingId} vanished while loading`);
  }
  const row = bookingRes.rows[0];
  const passengers = await client.query<PassengerRow>(
    `SELECT passenger_id, first_name, last_name, date_of_birth, seat_number, seat_class, checked_in, check_in_time
     FROM passengers WHERE booking_id=$1 ORDER BY position`,
    [bookingId]
  );
  const baggage = await client.query<BaggageRow>(
    `SELECT baggage_id, booking_id, tracking_number, baggage_type, weight_kg, status, created_at, updated_at
     FROM baggage_items WHERE booking_id=$1 ORDER BY baggage_id`,
    [bookingId]
  );
  return {
    id: row.booking_id,
    confirmationNumber: row.confirmation_number,
    userId: row.user_id,
    flightId: row.flight_id,
    status: parseEnum(BOOKING_STATUSES, row.status, 'booking status'),
    totalAmount: new Decimal(row.total_amount),
    paymentStatus: parseEnum(PAYMENT_STATUSES, row.payment_status, 'payment status'),
    paymentTransactionId: row.payment_transaction_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    passengers: passengers.rows.map(mapPassengerRow),
    baggage: baggage.rows.map(mapBaggageRow)
  };
}
