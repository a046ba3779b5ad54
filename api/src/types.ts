import type { Decimal } from 'decimal.js';

export const SEAT_CLASSES = ['Economy', 'PremiumEconomy', 'Business', 'First'] as const;
export type SeatClass = (typeof SEAT_CLASSES)[number];

export const FLIGHT_STATUSES = [
  'Scheduled',
  'OnTime',
  'Delayed',
  'Boarding',
  'Departed',
  'InFlight',
  'Arrived',
  'Cancelled'
] as const;
export type FlightStatus = (typeof FLIGHT_STATUSES)[number];

export const BOOKING_STATUSES = ['Pending', 'Confirmed', 'CheckedIn', 'Completed', 'Cancelled'] as const;
export type BookingStatus = (typeof BOOKING_STATUSES)[number];

export const PAYMENT_STATUSES = ['Pending', 'Processing', 'Completed', 'Failed', 'Refunded'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const BAGGAGE_TYPES = ['CarryOn', 'Checked', 'Oversized', 'Special'] as const;
export type BaggageType = (typeof BAGGAGE_TYPES)[number];

export const BAGGAGE_STATUSES = ['CheckedIn', 'InTransit', 'Loaded', 'Delivered', 'Lost'] as const;
export type BaggageStatus = (typeof BAGGAGE_STATUSES)[number];

export type FlightInstance = {
  id: number;
  flightNumber: string;
  airline: string;
  originAirport: string;
  destinationAirport: string;
  scheduledDeparture: Date;
  estimatedDeparture: Date | null;
  scheduledArrival: Date;
  estimatedArrival: Date | null;
  status: FlightStatus;
  gate: string | null;
  terminal: string | null;
  aircraft: string | null;
};

export type PassengerInput = {
  firstName: string;
  lastName: string;
  dateOfBirth?: Date | null;
  seatClass: SeatClass;
};

export type Passenger = {
  id: number;
  firstName: string;
  lastName: string;
  dateOfBirth: Date | null;
  seatNumber: string | null;
  seatClass: SeatClass;
  checkedIn: boolean;
  checkInTime: Date | null;
};

export type BaggageItem = {
  id: number;
  bookingId: number;
  trackingNumber: string;
  type: BaggageType;
  weightKg: number;
  status: BaggageStatus;
  createdAt: Date;
  updatedAt: Date;
};

export type Booking = {
  id: number;
  confirmationNumber: string;
  userId: string;
  flightId: number;
  status: BookingStatus;
  totalAmount: Decimal;
  paymentStatus: PaymentStatus;
  paymentTransactionId: string | null;
  createdAt: Date;
  updatedAt: Date;
  passengers: Passenger[];
  baggage: BaggageItem[];
};

export type BookingWithFlight = Booking & { flight: FlightInstance };

export type BoardingPass = {
  confirmationNumber: string;
  passengerName: string;
  flightNumber: string;
  seatNumber: string;
  gate: string;
  boardingTime: Date;
  qrCode: string;
};

export type CardInfo = {
  cardNumber: string;
  cardHolderName: string;
  expiryMonth: number;
  expiryYear: number;
  cvv: string;
};

export function parseEnum<T extends string>(values: readonly T[], value: string, what: string): T {
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Unknown ${what} "${value}"`);
  }
  return match;
}
