import pino from 'pino';
import { BaggageService } from '../../src/baggage-service.js';
import { BookingWorkflow, type CreateBookingRequest } from '../../src/booking-service.js';
import type { BookingStore } from '../../src/booking-store.js';
import { CodeGenerator } from '../../src/codes.js';
import { SimulatedPaymentGateway } from '../../src/payment.js';
import type { RandomSource } from '../../src/random.js';
import type { FlightInstance } from '../../src/types.js';
import {
  MemoryBaggageStore,
  MemoryBookingStore,
  MemoryFlightDirectory,
  MemorySeatInventory,
  MemoryUserDirectory,
  RecordingNotificationSender
} from './memory.js';
import { seededRandom } from './random.js';

export const NOW = new Date('2030-03-10T12:00:00Z');
export const USER_ID = 'user-1';
export const USER_EMAIL = 'traveller@example.com';

export const silentLogger = pino({ level: 'silent' });

/** Departs 27 hours after NOW. */
export function flightFixture(overrides: Partial<FlightInstance> = {}): FlightInstance {
  return {
    id: 1,
    flightNumber: 'AA123',
    airline: 'American Airlines',
    originAirport: 'ORD',
    destinationAirport: 'LAX',
    scheduledDeparture: new Date('2030-03-11T15:00:00Z'),
    estimatedDeparture: null,
    scheduledArrival: new Date('2030-03-11T19:30:00Z'),
    estimatedArrival: null,
    status: 'Scheduled',
    gate: 'A12',
    terminal: '1',
    aircraft: 'Boeing 737-800',
    ...overrides
  };
}

export function bookingRequest(overrides: Partial<CreateBookingRequest> = {}): CreateBookingRequest {
  return {
    flightNumber: 'AA123',
    flightDate: '2030-03-11',
    userId: USER_ID,
    passengers: [
      { firstName: 'Ada', lastName: 'Lovelace', seatClass: 'Economy' },
      { firstName: 'Alan', lastName: 'Turing', seatClass: 'Business' }
    ],
    selectedSeats: ['14A', '3B'],
    ...overrides
  };
}

export type HarnessOptions = {
  flights?: FlightInstance[];
  paymentSuccessRate?: number;
  refundSuccessRate?: number;
  codesRandom?: RandomSource;
  paymentTimeoutMs?: number;
  notificationTimeoutMs?: number;
  /** Replaces the in-memory store behind the booking workflow. */
  bookingStore?: BookingStore;
};

export function createHarness(options: HarnessOptions = {}) {
  const clock = { now: NOW };
  const now = () => clock.now;
  const flights = new MemoryFlightDirectory(options.flights ?? [flightFixture()]);
  const seats = new MemorySeatInventory(flights);
  const bookings = new MemoryBookingStore(seats, flights);
  const baggageStore = new MemoryBaggageStore(bookings, flights);
  const users = new MemoryUserDirectory({ [USER_ID]: USER_EMAIL });
  const notifications = new RecordingNotificationSender();
  const codes = new CodeGenerator(options.codesRandom ?? seededRandom(42));
  const payments = new SimulatedPaymentGateway(
    {
      successRate: options.paymentSuccessRate ?? 1,
      refundSuccessRate: options.refundSuccessRate ?? 1,
      latencyMs: 0,
      random: seededRandom(7),
      clock: now
    },
    silentLogger
  );

  const workflow = new BookingWorkflow({
    flights,
    seats,
    bookings: options.bookingStore ?? bookings,
    payments,
    notifications,
    users,
    codes,
    logger: silentLogger,
    options: {
      baseFare: '299.99',
      maxConfirmationAttempts: 5,
      checkInWindowHours: 24,
      paymentTimeoutMs: options.paymentTimeoutMs ?? 1_000,
      notificationTimeoutMs: options.notificationTimeoutMs ?? 50
    },
    clock: now
  });

  const baggage = new BaggageService({
    bookings,
    baggage: baggageStore,
    codes,
    logger: silentLogger,
    maxTrackingAttempts: 5,
    clock: now
  });

  return { clock, flights, seats, bookings, baggageStore, users, notifications, codes, payments, workflow, baggage };
}

export type Harness = ReturnType<typeof createHarness>;
