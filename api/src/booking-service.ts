import { Decimal } from 'decimal.js';
import { assertTransition } from './booking-state.js';
import type { BookingStore, NewPassenger } from './booking-store.js';
import { type CodeGenerator, withUniqueCode } from './codes.js';
import {
  BookingNotFoundError,
  BookingPersistenceFailedError,
  CheckInClosedError,
  CheckInNotYetAvailableError,
  ConfirmationCollisionError,
  FlightCancelledError,
  FlightDepartedError,
  FlightNotFoundError,
  ForbiddenError,
  InvalidBookingStateError,
  PaymentDeclinedError,
  SeatUnavailableError,
  UpstreamUnavailableError,
  ValidationError
} from './errors.js';
import { priceFor } from './fare.js';
import { isFlightDate, normalizeFlightNumber, type FlightDirectory } from './flight-service.js';
import type { Logger } from './logger.js';
import type { NotificationSender, UserDirectory } from './notification.js';
import { demoCard, type PaymentGateway, type PaymentResult } from './payment.js';
import { normalizeSeatNumber, type SeatMap } from './seat-map.js';
import type { SeatInventory } from './seat-service.js';
import { TimeoutError, withTimeout } from './timeout.js';
import type {
  BoardingPass,
  Booking,
  BookingWithFlight,
  CardInfo,
  FlightInstance,
  Passenger,
  PassengerInput
} from './types.js';

const HOUR_MS = 60 * 60 * 1000;
const BOARDING_LEAD_MS = 30 * 60 * 1000;

export type CreateBookingRequest = {
  flightNumber: string;
  /** UTC calendar date of the scheduled departure, `YYYY-MM-DD`. */
  flightDate: string;
  userId: string;
  passengers: PassengerInput[];
  /** Seat i goes to passenger i; passengers past the end have no seat yet. */
  selectedSeats?: string[];
  payment?: CardInfo;
};

export type CheckInResult = {
  booking: BookingWithFlight;
  boardingPass: BoardingPass;
  boardingPasses: BoardingPass[];
};

export type BookingWorkflowOptions = {
  baseFare: Decimal.Value;
  maxConfirmationAttempts: number;
  checkInWindowHours: number;
  paymentTimeoutMs: number;
  notificationTimeoutMs: number;
};

export type BookingWorkflowDeps = {
  flights: FlightDirectory;
  seats: SeatInventory;
  bookings: BookingStore;
  payments: PaymentGateway;
  notifications: NotificationSender;
  users: UserDirectory;
  codes: CodeGenerator;
  logger: Logger;
  options: BookingWorkflowOptions;
  clock?: () => Date;
};

/**
 * Booking creation, lookup, check-in and cancellation. Each call reads one
 * flight snapshot and runs as its own unit of work against the stores.
 */
export class BookingWorkflow {
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly inflight = new Set<Promise<void>>();

  constructor(private readonly deps: BookingWorkflowDeps) {
    this.logger = deps.logger.child({ component: 'booking' });
    this.clock = deps.clock ?? (() => new Date());
  }

  async createBooking(request: CreateBookingRequest): Promise<BookingWithFlight> {
    const { flightNumber, flightDate, userId, passengers, selectedSeats } = validateCreateRequest(request);
    const now = this.clock();

    const flight = await this.deps.flights.getFlightInstance(flightNumber, flightDate);
    if (!flight) {
      throw new FlightNotFoundError(flightNumber, flightDate);
    }
    if (flight.scheduledDeparture.getTime() <= now.getTime()) {
      throw new FlightDepartedError();
    }
    if (flight.status === 'Cancelled') {
      throw new FlightCancelledError();
    }

    const seatMap = await this.deps.seats.getSeatMap(flight);
    const seated = assignSelectedSeats(passengers, selectedSeats, seatMap);
    const totalAmount = priceFor(passengers, this.deps.options.baseFare);

    const payment = await this.charge(totalAmount, request.payment ?? demoCard(userId, now), flight, userId);
    if (!payment.success) {
      this.logger.info({ flightNumber, userId, reason: payment.errorMessage }, 'Booking payment declined');
      throw new PaymentDeclinedError(payment.errorMessage);
    }

    let booking: Booking;
    try {
      booking = await withUniqueCode(
        () => this.deps.codes.generateConfirmationNumber(),
        (confirmationNumber) =>
          this.deps.bookings.insertBooking({
            confirmationNumber,
            userId,
            flightId: flight.id,
            status: 'Confirmed',
            paymentStatus: 'Completed',
            paymentTransactionId: payment.transactionId,
            totalAmount,
            createdAt: now,
            passengers: seated
          }),
        this.deps.options.maxConfirmationAttempts,
        (attempts) => new ConfirmationCollisionError(attempts),
        (code, attempt) => this.logger.warn({ code, attempt }, 'Confirmation number collision, regenerating')
      );
    } catch (err) {
      await this.refundAfterFailure(payment.transactionId, totalAmount, err);
      if (err instanceof SeatUnavailableError || err instanceof ConfirmationCollisionError) {
        throw err;
      }
      this.logger.error({ err, flightNumber, userId }, 'Booking persistence failed after payment');
      throw new BookingPersistenceFailedError();
    }

    const result: BookingWithFlight = { ...booking, flight };
    this.dispatchConfirmation(result);
    this.logger.info(
      { confirmationNumber: booking.confirmationNumber, flightNumber, total: totalAmount.toFixed(2) },
      'Booking created'
    );
    return result;
  }

  async getBooking(confirmationNumber: string): Promise<BookingWithFlight> {
    const booking = await this.findBooking(confirmationNumber);
    const flight = await this.flightOf(booking);
    return { ...booking, flight };
  }

  async checkIn(confirmationNumber: string): Promise<CheckInResult> {
    const now = this.clock();
    const booking = await this.findBooking(confirmationNumber);
    assertTransition(booking.status, 'CheckedIn');
    if (booking.passengers.length === 0) {
      throw new InvalidBookingStateError('No passengers found for this booking');
    }

    const flight = await this.flightOf(booking);
    if (flight.status === 'Cancelled') {
      throw new FlightCancelledError();
    }
    const departure = flight.scheduledDeparture.getTime();
    const opensAt = new Date(departure - this.deps.options.checkInWindowHours * HOUR_MS);
    if (now.getTime() < opensAt.getTime()) {
      throw new CheckInNotYetAvailableError(opensAt);
    }
    if (now.getTime() >= departure) {
      throw new CheckInClosedError();
    }

    const updated = await this.deps.bookings.checkIn(booking.id, now);
    const boardingPasses = updated.passengers.map((passenger) => this.boardingPass(updated, flight, passenger));
    this.logger.info({ confirmationNumber: updated.confirmationNumber }, 'Check-in completed');
    return {
      booking: { ...updated, flight },
      boardingPass: boardingPasses[0],
      boardingPasses
    };
  }

  async cancelBooking(confirmationNumber: string, userId: string): Promise<Booking> {
    const booking = await this.findBooking(confirmationNumber);
    if (booking.userId !== userId) {
      throw new ForbiddenError('You can only cancel your own bookings');
    }
    assertTransition(booking.status, 'Cancelled');

    const cancelled = await this.deps.bookings.cancel(booking.id, this.clock());
    this.logger.info({ confirmationNumber }, 'Booking cancelled');

    if (!booking.paymentTransactionId || booking.paymentStatus !== 'Completed') {
      return cancelled;
    }
    const refunded = await this.tryRefund(booking.paymentTransactionId, booking.totalAmount);
    if (!refunded) {
      this.logger.error(
        { confirmationNumber, transactionId: booking.paymentTransactionId, amount: booking.totalAmount.toFixed(2) },
        'Refund for cancelled booking failed; manual reconciliation required'
      );
      return cancelled;
    }
    await this.deps.bookings.setPaymentStatus(booking.id, 'Refunded');
    return { ...cancelled, paymentStatus: 'Refunded' };
  }

  async getSeatMap(flightNumber: string, date: string): Promise<SeatMap> {
    const normalized = normalizeFlightNumber(flightNumber);
    if (!normalized) {
      throw new ValidationError('Flight number is required');
    }
    if (!isFlightDate(date)) {
      throw new ValidationError('Flight date must be formatted as YYYY-MM-DD');
    }
    const flight = await this.deps.flights.getFlightInstance(normalized, date);
    if (!flight) {
      throw new FlightNotFoundError(normalized, date);
    }
    return this.deps.seats.getSeatMap(flight);
  }

  async completeArrivedBookings(): Promise<number> {
    return this.deps.bookings.completeArrived();
  }

  /** Resolves once every confirmation dispatched so far has settled. */
  async whenIdle(): Promise<void> {
    await Promise.allSettled([...this.inflight]);
  }

  private async findBooking(confirmationNumber: string): Promise<Booking> {
    const booking = await this.deps.bookings.findByConfirmation(confirmationNumber.trim().toUpperCase());
    if (!booking) {
      throw new BookingNotFoundError(confirmationNumber);
    }
    return booking;
  }

  private async flightOf(booking: Booking): Promise<FlightInstance> {
    const flight = await this.deps.flights.getFlightById(booking.flightId);
    if (!flight) {
      throw new Error(`Flight ${booking.flightId} referenced by ${booking.confirmationNumber} is missing`);
    }
    return flight;
  }

  private async charge(
    amount: Decimal,
    card: CardInfo,
    flight: FlightInstance,
    userId: string
  ): Promise<PaymentResult> {
    try {
      return await withTimeout(
        this.deps.payments.charge(amount, card, `Flight booking for ${flight.flightNumber}`),
        this.deps.options.paymentTimeoutMs,
        'payment'
      );
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.logger.error(
          { flightNumber: flight.flightNumber, userId, amount: amount.toFixed(2) },
          'Payment gateway timed out; charge outcome unknown'
        );
        throw new UpstreamUnavailableError('payment');
      }
      throw err;
    }
  }

  private async tryRefund(transactionId: string, amount: Decimal): Promise<boolean> {
    try {
      const result = await withTimeout(
        this.deps.payments.refund(transactionId, amount),
        this.deps.options.paymentTimeoutMs,
        'refund'
      );
      return result.success;
    } catch (err) {
      this.logger.warn({ err, transactionId }, 'Refund call failed');
      return false;
    }
  }

  private async refundAfterFailure(transactionId: string, amount: Decimal, cause: unknown): Promise<void> {
    const refunded = await this.tryRefund(transactionId, amount);
    if (refunded) {
      this.logger.warn({ transactionId, amount: amount.toFixed(2), cause }, 'Charge refunded after booking failure');
      return;
    }
    this.logger.error(
      { transactionId, amount: amount.toFixed(2), cause },
      'Refund after booking failure did not go through; manual reconciliation required'
    );
  }

  private boardingPass(booking: Booking, flight: FlightInstance, passenger: Passenger): BoardingPass {
    return {
      confirmationNumber: booking.confirmationNumber,
      passengerName: `${passenger.firstName} ${passenger.lastName}`,
      flightNumber: flight.flightNumber,
      seatNumber: passenger.seatNumber ?? 'TBD',
      gate: flight.gate ?? 'TBD',
      boardingTime: new Date(flight.scheduledDeparture.getTime() - BOARDING_LEAD_MS),
      qrCode: this.deps.codes.generateBoardingQrPayload(booking.confirmationNumber)
    };
  }

  private dispatchConfirmation(booking: BookingWithFlight): void {
    const task = this.sendConfirmation(booking).finally(() => {
      this.inflight.delete(task);
    });
    this.inflight.add(task);
  }

  private async sendConfirmation(booking: BookingWithFlight): Promise<void> {
    const { confirmationNumber } = booking;
    const timeoutMs = this.deps.options.notificationTimeoutMs;
    try {
      const email = await withTimeout(this.deps.users.getEmail(booking.userId), timeoutMs, 'user lookup');
      if (!email) {
        this.logger.warn({ confirmationNumber, userId: booking.userId }, 'No email on file; confirmation not sent');
        return;
      }
      const delivered = await withTimeout(
        this.deps.notifications.sendBookingConfirmation(booking, email),
        timeoutMs,
        'notification'
      );
      if (!delivered) {
        this.logger.warn({ confirmationNumber }, 'Booking confirmation was not delivered');
      }
    } catch (err) {
      this.logger.error({ err, confirmationNumber }, 'Failed to send booking confirmation');
    }
  }
}

type ValidCreateRequest = {
  flightNumber: string;
  flightDate: string;
  userId: string;
  passengers: PassengerInput[];
  selectedSeats: string[];
};

export function validateCreateRequest(request: CreateBookingRequest): ValidCreateRequest {
  const flightNumber = normalizeFlightNumber(request.flightNumber);
  const userId = request.userId.trim();
  if (!flightNumber || !userId) {
    throw new ValidationError('Flight number and user ID are required');
  }
  if (!isFlightDate(request.flightDate)) {
    throw new ValidationError('Flight date must be formatted as YYYY-MM-DD');
  }
  const { passengers } = request;
  if (passengers.length === 0) {
    throw new ValidationError('At least one passenger is required');
  }
  const cleaned = passengers.map((p) => ({ ...p, firstName: p.firstName.trim(), lastName: p.lastName.trim() }));
  if (cleaned.some((p) => !p.firstName || !p.lastName)) {
    throw new ValidationError('Passenger first name and last name are required');
  }

  const selectedSeats = (request.selectedSeats ?? []).map(normalizeSeatNumber);
  if (selectedSeats.length > cleaned.length) {
    throw new ValidationError('More seats selected than passengers');
  }
  if (selectedSeats.some((seat) => seat === '')) {
    throw new ValidationError('Selected seat numbers cannot be empty');
  }
  if (new Set(selectedSeats).size !== selectedSeats.length) {
    throw new ValidationError('The same seat was selected more than once');
  }
  return { flightNumber, flightDate: request.flightDate, userId, passengers: cleaned, selectedSeats };
}

function assignSelectedSeats(passengers: PassengerInput[], selectedSeats: string[], seatMap: SeatMap): NewPassenger[] {
  return passengers.map((passenger, i) => {
    const selected = selectedSeats[i];
    if (selected === undefined) {
      return { ...passenger, seatNumber: null };
    }
    const seat = seatMap.seat(selected);
    if (seat.seatClass !== passenger.seatClass) {
      throw new ValidationError(
        `Seat ${seat.seatNumber} is ${seat.seatClass} but passenger ${i + 1} is booked in ${passenger.seatClass}`
      );
    }
    if (!seat.isAvailable) {
      throw new SeatUnavailableError(seat.seatNumber);
    }
    return { ...passenger, seatNumber: seat.seatNumber };
  });
}
