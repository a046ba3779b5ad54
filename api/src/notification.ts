import type pg from 'pg';
import type { Logger } from './logger.js';
import type { BookingWithFlight } from './types.js';

export interface NotificationSender {
  /** Best-effort delivery; resolves `false` instead of throwing on failure. */
  sendBookingConfirmation(booking: BookingWithFlight, email: string): Promise<boolean>;
}

export interface UserDirectory {
  getEmail(userId: string): Promise<string | null>;
}

export function renderBookingConfirmation(booking: BookingWithFlight): string {
  const { flight } = booking;
  const lines = [
    `Flight booking confirmed: ${booking.confirmationNumber}`,
    '',
    `Flight: ${flight.flightNumber} - ${flight.airline}`,
    `Route: ${flight.originAirport} -> ${flight.destinationAirport}`,
    `Departure: ${flight.scheduledDeparture.toISOString()}`,
    `Arrival: ${flight.scheduledArrival.toISOString()}`
  ];
  if (flight.gate) lines.push(`Gate: ${flight.gate}`);
  if (flight.terminal) lines.push(`Terminal: ${flight.terminal}`);
  lines.push('', 'Passengers:');
  for (const p of booking.passengers) {
    lines.push(`  ${p.firstName} ${p.lastName} - seat ${p.seatNumber ?? 'TBD'} (${p.seatClass})`);
  }
  lines.push('', `Total paid: $${booking.totalAmount.toFixed(2)}`);
  return lines.join('\n');
}

/**
 * Writes the rendered message to the log instead of handing it to a mail
 * provider.
 */
export class LogNotificationSender implements NotificationSender {
  constructor(private readonly logger: Logger) {}

  async sendBookingConfirmation(booking: BookingWithFlight, email: string): Promise<boolean> {
    try {
      const body = renderBookingConfirmation(booking);
      this.logger.info(
        { email, confirmationNumber: booking.confirmationNumber, body },
        'Booking confirmation email sent'
      );
      return true;
    } catch (err) {
      this.logger.error({ err, email }, 'Failed to send booking confirmation email');
      return false;
    }
  }
}

export class PgUserDirectory implements UserDirectory {
  constructor(private readonly db: pg.Pool) {}

  async getEmail(userId: string): Promise<string | null> {
    const { rows } = await this.db.query<{ email: string }>('SELECT email FROM users WHERE user_id=$1', [userId]);
    return rows.length > 0 ? rows[0].email : null;
  }
}
