import { Type, type TLiteral, type TUnion } from '@sinclair/typebox';
import {
  BAGGAGE_STATUSES,
  BAGGAGE_TYPES,
  BOOKING_STATUSES,
  FLIGHT_STATUSES,
  PAYMENT_STATUSES,
  SEAT_CLASSES
} from './types.js';

const literalUnion = <T extends string>(values: readonly T[]): TUnion<TLiteral<T>[]> =>
  Type.Union(values.map((value) => Type.Literal(value)));

const DateTime = Type.String({ format: 'date-time' });
const NullableString = Type.Union([Type.String(), Type.Null()]);
const NullableDateTime = Type.Union([DateTime, Type.Null()]);

export const SeatClass = literalUnion(SEAT_CLASSES);
export const FlightStatus = literalUnion(FLIGHT_STATUSES);
export const BookingStatus = literalUnion(BOOKING_STATUSES);
export const PaymentStatus = literalUnion(PAYMENT_STATUSES);
export const BaggageType = literalUnion(BAGGAGE_TYPES);
export const BaggageStatus = literalUnion(BAGGAGE_STATUSES);

export const ErrorResponse = Type.Object({
  error: Type.String(),
  message: Type.String(),
  opensAt: Type.Optional(DateTime)
});

export const UserHeaders = Type.Object({
  'x-user-id': Type.Optional(Type.String())
});

export const ConfirmationParams = Type.Object({ confirmationNumber: Type.String() });
export const FlightParams = Type.Object({ flightNumber: Type.String() });
export const TrackingParams = Type.Object({ trackingNumber: Type.String() });
export const DateQuery = Type.Object({ date: Type.Optional(Type.String({ format: 'date' })) });

export const PassengerRequest = Type.Object({
  firstName: Type.String({ maxLength: 100 }),
  lastName: Type.String({ maxLength: 100 }),
  dateOfBirth: Type.Optional(Type.String({ format: 'date' })),
  seatClass: SeatClass
});

export const PaymentInfo = Type.Object({
  cardNumber: Type.String(),
  cardHolderName: Type.String(),
  expiryMonth: Type.Integer(),
  expiryYear: Type.Integer(),
  cvv: Type.String()
});

export const CreateBookingRequest = Type.Object({
  flightNumber: Type.String(),
  flightDate: Type.String({ format: 'date' }),
  passengers: Type.Array(PassengerRequest),
  selectedSeats: Type.Optional(Type.Array(Type.String({ maxLength: 5 }))),
  payment: Type.Optional(PaymentInfo)
});

export const BookingResponse = Type.Object({
  confirmationNumber: Type.String(),
  status: BookingStatus,
  totalAmount: Type.Number(),
  createdAt: DateTime
});

export const FlightSummary = Type.Object({
  flightNumber: Type.String(),
  airline: Type.String(),
  originAirport: Type.String(),
  destinationAirport: Type.String(),
  scheduledDeparture: DateTime,
  estimatedDeparture: NullableDateTime,
  scheduledArrival: DateTime,
  estimatedArrival: NullableDateTime,
  status: FlightStatus,
  gate: NullableString,
  terminal: NullableString
});

export const FlightDetails = Type.Composite([FlightSummary, Type.Object({ aircraft: NullableString })]);

export const PassengerDto = Type.Object({
  firstName: Type.String(),
  lastName: Type.String(),
  seatNumber: NullableString,
  seatClass: SeatClass,
  checkedIn: Type.Boolean(),
  checkInTime: NullableDateTime
});

export const BaggageItemDto = Type.Object({
  trackingNumber: Type.String(),
  type: BaggageType,
  weightKg: Type.Number(),
  status: BaggageStatus,
  createdAt: DateTime
});

export const BookingDetailsResponse = Type.Object({
  confirmationNumber: Type.String(),
  status: BookingStatus,
  paymentStatus: PaymentStatus,
  totalAmount: Type.Number(),
  flight: FlightSummary,
  passengers: Type.Array(PassengerDto),
  baggage: Type.Array(BaggageItemDto),
  createdAt: DateTime
});

export const BoardingPass = Type.Object({
  confirmationNumber: Type.String(),
  passengerName: Type.String(),
  flightNumber: Type.String(),
  seatNumber: Type.String(),
  gate: Type.String(),
  boardingTime: DateTime,
  qrCode: Type.String()
});

export const CheckInResponse = Type.Object({
  success: Type.Literal(true),
  boardingPass: BoardingPass,
  boardingPasses: Type.Array(BoardingPass)
});

export const CancelResponse = Type.Object({
  confirmationNumber: Type.String(),
  status: BookingStatus,
  paymentStatus: PaymentStatus
});

export const SeatDto = Type.Object({
  number: Type.String(),
  seatClass: SeatClass,
  isAvailable: Type.Boolean()
});

export const SeatMapResponse = Type.Object({
  flightNumber: Type.String(),
  flightDate: Type.String({ format: 'date' }),
  availableSeats: Type.Integer(),
  rows: Type.Array(
    Type.Object({
      rowNumber: Type.Integer(),
      seats: Type.Array(SeatDto)
    })
  )
});

export const BaggageRequest = Type.Object({
  type: Type.Optional(BaggageType),
  weightKg: Type.Number()
});

export const BaggageStatusRequest = Type.Object({
  status: BaggageStatus
});

export const BaggageTrackingResponse = Type.Object({
  trackingNumber: Type.String(),
  type: BaggageType,
  weightKg: Type.Number(),
  status: BaggageStatus,
  flightNumber: Type.String(),
  confirmationNumber: Type.String(),
  currentLocation: Type.String(),
  lastUpdated: DateTime,
  statusHistory: Type.Array(
    Type.Object({
      status: BaggageStatus,
      location: Type.String(),
      description: Type.String()
    })
  )
});

export const FlightBoardQuery = Type.Object({
  airport: Type.Optional(Type.String({ minLength: 3, maxLength: 3 })),
  search: Type.Optional(Type.String()),
  status: Type.Optional(FlightStatus),
  airline: Type.Optional(Type.String())
});

export const FlightBoardResponse = Type.Object({
  airport: Type.String(),
  flights: Type.Array(FlightSummary),
  totalCount: Type.Integer(),
  lastUpdated: DateTime
});

export const FlightDetailsResponse = Type.Object({
  flight: FlightDetails,
  lastUpdated: DateTime
});

export const WeatherInfo = Type.Object({
  location: Type.String(),
  temperatureC: Type.Number(),
  conditions: Type.String(),
  visibilityKm: Type.Number(),
  windSpeedKph: Type.Number(),
  windDirection: Type.String()
});

export const WeatherResponse = Type.Object({
  flightNumber: Type.String(),
  originAirport: Type.String(),
  destinationAirport: Type.String(),
  originWeather: Type.Union([WeatherInfo, Type.Null()]),
  destinationWeather: Type.Union([WeatherInfo, Type.Null()]),
  lastUpdated: DateTime
});

export const HealthResponse = Type.Object({ status: Type.String() });
