export type BookingErrorKind =
  | 'validation'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'state_conflict'
  | 'payment_declined'
  | 'persistence'
  | 'upstream';

export type BookingErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHENTICATED'
  | 'FORBIDDEN'
  | 'FLIGHT_NOT_FOUND'
  | 'BOOKING_NOT_FOUND'
  | 'SEAT_NOT_FOUND'
  | 'BAGGAGE_NOT_FOUND'
  | 'FLIGHT_DEPARTED'
  | 'FLIGHT_CANCELLED'
  | 'SEAT_UNAVAILABLE'
  | 'CHECKIN_NOT_YET_AVAILABLE'
  | 'CHECKIN_CLOSED'
  | 'INVALID_STATE'
  | 'INVALID_BAGGAGE_STATE'
  | 'PAYMENT_DECLINED'
  | 'CONFIRMATION_COLLISION'
  | 'TRACKING_NUMBER_COLLISION'
  | 'BOOKING_PERSISTENCE_FAILED'
  | 'UPSTREAM_UNAVAILABLE';

/**
 * Base class for every failure the booking core reports to its callers.
 * `message` is always safe to show to an end user.
 */
export class BookingError extends Error {
  readonly code: BookingErrorCode;
  readonly kind: BookingErrorKind;
  readonly statusCode: number;

  constructor(code: BookingErrorCode, kind: BookingErrorKind, statusCode: number, message: string) {
    super(message);
    this.code = code;
    this.kind = kind;
    this.statusCode = statusCode;
    this.name = 'BookingError';
  }
}

export class ValidationError extends BookingError {
  constructor(message: string) {
    super('VALIDATION_ERROR', 'validation', 400, message);
    this.name = 'ValidationError';
  }
}

export class UnauthenticatedError extends BookingError {
  constructor() {
    super('UNAUTHENTICATED', 'unauthorized', 401, 'Authentication required');
    this.name = 'UnauthenticatedError';
  }
}

export class ForbiddenError extends BookingError {
  constructor(message: string) {
    super('FORBIDDEN', 'forbidden', 403, message);
    this.name = 'ForbiddenError';
  }
}

export class FlightNotFoundError extends BookingError {
  constructor(flightNumber: string, date: string) {
    super('FLIGHT_NOT_FOUND', 'not_found', 404, `Flight ${flightNumber} not found for ${date}`);
    this.name = 'FlightNotFoundError';
  }
}

export class BookingNotFoundError extends BookingError {
  constructor(confirmationNumber: string) {
    super('BOOKING_NOT_FOUND', 'not_found', 404, `Booking ${confirmationNumber} not found`);
    this.name = 'BookingNotFoundError';
  }
}

export class SeatNotFoundError extends BookingError {
  readonly seatNumber: string;

  constructor(seatNumber: string) {
    super('SEAT_NOT_FOUND', 'not_found', 404, `Seat ${seatNumber} does not exist on this flight`);
    this.seatNumber = seatNumber;
    this.name = 'SeatNotFoundError';
  }
}

export class BaggageNotFoundError extends BookingError {
  constructor(trackingNumber: string) {
    super('BAGGAGE_NOT_FOUND', 'not_found', 404, `Baggage ${trackingNumber} not found`);
    this.name = 'BaggageNotFoundError';
  }
}

export class FlightDepartedError extends BookingError {
  constructor() {
    super('FLIGHT_DEPARTED', 'state_conflict', 400, 'Cannot book flights that have already departed');
    this.name = 'FlightDepartedError';
  }
}

export class FlightCancelledError extends BookingError {
  constructor() {
    super('FLIGHT_CANCELLED', 'state_conflict', 400, 'This flight has been cancelled');
    this.name = 'FlightCancelledError';
  }
}

export class SeatUnavailableError extends BookingError {
  readonly seatNumber: string;

  constructor(seatNumber: string) {
    super('SEAT_UNAVAILABLE', 'state_conflict', 409, `Seat ${seatNumber} is no longer available`);
    this.seatNumber = seatNumber;
    this.name = 'SeatUnavailableError';
  }
}

export class CheckInNotYetAvailableError extends BookingError {
  readonly opensAt: Date;

  constructor(opensAt: Date) {
    super(
      'CHECKIN_NOT_YET_AVAILABLE',
      'state_conflict',
      400,
      `Check-in not yet available. Opens at ${opensAt.toISOString()}.`
    );
    this.opensAt = opensAt;
    this.name = 'CheckInNotYetAvailableError';
  }
}

export class CheckInClosedError extends BookingError {
  constructor() {
    super('CHECKIN_CLOSED', 'state_conflict', 400, 'Check-in is closed for this flight');
    this.name = 'CheckInClosedError';
  }
}

export class InvalidBookingStateError extends BookingError {
  constructor(message: string) {
    super('INVALID_STATE', 'state_conflict', 409, message);
    this.name = 'InvalidBookingStateError';
  }
}

export class InvalidBaggageStateError extends BookingError {
  constructor(message: string) {
    super('INVALID_BAGGAGE_STATE', 'state_conflict', 409, message);
    this.name = 'InvalidBaggageStateError';
  }
}

export class PaymentDeclinedError extends BookingError {
  constructor(message: string) {
    super('PAYMENT_DECLINED', 'payment_declined', 400, message);
    this.name = 'PaymentDeclinedError';
  }
}

export class ConfirmationCollisionError extends BookingError {
  constructor(attempts: number) {
    super(
      'CONFIRMATION_COLLISION',
      'persistence',
      500,
      `Could not allocate a unique confirmation number after ${attempts} attempts`
    );
    this.name = 'ConfirmationCollisionError';
  }
}

export class TrackingNumberCollisionError extends BookingError {
  constructor(attempts: number) {
    super(
      'TRACKING_NUMBER_COLLISION',
      'persistence',
      500,
      `Could not allocate a unique tracking number after ${attempts} attempts`
    );
    this.name = 'TrackingNumberCollisionError';
  }
}

export class BookingPersistenceFailedError extends BookingError {
  constructor() {
    super('BOOKING_PERSISTENCE_FAILED', 'persistence', 500, 'Booking could not be saved. Please try again later.');
    this.name = 'BookingPersistenceFailedError';
  }
}

export class UpstreamUnavailableError extends BookingError {
  constructor(service: string) {
    super('UPSTREAM_UNAVAILABLE', 'upstream', 503, `The ${service} service is temporarily unavailable`);
    this.name = 'UpstreamUnavailableError';
  }
}

/**
 * Raised by stores when a generated code hits a uniqueness constraint.
 * Consumed by the retry loops; never reaches HTTP callers.
 */
export class DuplicateCodeError extends Error {
  readonly code: string;

  constructor(code: string) {
    super(`Generated code ${code} already exists`);
    this.code = code;
    this.name = 'DuplicateCodeError';
  }
}
