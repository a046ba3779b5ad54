import Fastify, { type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import rateLimit from '@fastify/rate-limit';
import type { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import type { Static } from '@sinclair/typebox';
import type { BaggageService, BaggageTracking } from './baggage-service.js';
import type { BookingWorkflow } from './booking-service.js';
import { BookingError, CheckInNotYetAvailableError, FlightNotFoundError, UnauthenticatedError } from './errors.js';
import { normalizeFlightNumber, toFlightDate, type FlightDirectory } from './flight-service.js';
import type { Logger } from './logger.js';
import { registerBurstGuard, type BurstGuardOptions } from './rate-limit.js';
import {
  BaggageItemDto,
  BaggageRequest,
  BaggageStatusRequest,
  BaggageTrackingResponse,
  BookingDetailsResponse,
  BookingResponse,
  CancelResponse,
  CheckInResponse,
  ConfirmationParams,
  CreateBookingRequest,
  DateQuery,
  ErrorResponse,
  FlightBoardQuery,
  FlightBoardResponse,
  FlightDetailsResponse,
  FlightParams,
  FlightSummary,
  HealthResponse,
  SeatMapResponse,
  TrackingParams,
  UserHeaders,
  WeatherResponse
} from './schemas.js';
import type { SeatMap } from './seat-map.js';
import type { BaggageItem, BoardingPass, BookingWithFlight, FlightInstance } from './types.js';
import type { WeatherProvider } from './weather.js';

export const DEFAULT_BOARD_AIRPORT = 'ORD';

export type AppServices = {
  bookings: BookingWorkflow;
  baggage: BaggageService;
  flights: FlightDirectory;
  weather: WeatherProvider;
  /** Rejects when a backing store is unreachable. */
  checkReady: () => Promise<void>;
};

export type AppOptions = {
  logger: Logger;
  requestTimeoutMs?: number;
  burstGuard?: BurstGuardOptions | false;
  docs?: boolean;
  clock?: () => Date;
};

type ErrorBody = Static<typeof ErrorResponse>;

const iso = (at: Date) => at.toISOString();
const isoOrNull = (at: Date | null) => (at ? at.toISOString() : null);

function flightSummary(flight: FlightInstance): Static<typeof FlightSummary> {
  return {
    flightNumber: flight.flightNumber,
    airline: flight.airline,
    originAirport: flight.originAirport,
    destinationAirport: flight.destinationAirport,
    scheduledDeparture: iso(flight.scheduledDeparture),
    estimatedDeparture: isoOrNull(flight.estimatedDeparture),
    scheduledArrival: iso(flight.scheduledArrival),
    estimatedArrival: isoOrNull(flight.estimatedArrival),
    status: flight.status,
    gate: flight.gate,
    terminal: flight.terminal
  };
}

function baggageDto(item: BaggageItem): Static<typeof BaggageItemDto> {
  return {
    trackingNumber: item.trackingNumber,
    type: item.type,
    weightKg: item.weightKg,
    status: item.status,
    createdAt: iso(item.createdAt)
  };
}

function bookingDetails(booking: BookingWithFlight): Static<typeof BookingDetailsResponse> {
  return {
    confirmationNumber: booking.confirmationNumber,
    status: booking.status,
    paymentStatus: booking.paymentStatus,
    totalAmount: booking.totalAmount.toNumber(),
    flight: flightSummary(booking.flight),
    passengers: booking.passengers.map((p) => ({
      firstName: p.firstName,
      lastName: p.lastName,
      seatNumber: p.seatNumber,
      seatClass: p.seatClass,
      checkedIn: p.checkedIn,
      checkInTime: isoOrNull(p.checkInTime)
    })),
    baggage: booking.baggage.map(baggageDto),
    createdAt: iso(booking.createdAt)
  };
}

function boardingPassDto(pass: BoardingPass) {
  return { ...pass, boardingTime: iso(pass.boardingTime) };
}

function seatMapDto(seatMap: SeatMap, flightDate: string): Static<typeof SeatMapResponse> {
  return {
    flightNumber: seatMap.flightNumber,
    flightDate,
    availableSeats: seatMap.availableCount(),
    rows: seatMap.rows.map((row) => ({
      rowNumber: row.rowNumber,
      seats: row.seats.map((seat) => ({
        number: seat.seatNumber,
        seatClass: seat.seatClass,
        isAvailable: seat.isAvailable
      }))
    }))
  };
}

function trackingDto(tracking: BaggageTracking): Static<typeof BaggageTrackingResponse> {
  return {
    trackingNumber: tracking.trackingNumber,
    type: tracking.type,
    weightKg: tracking.weightKg,
    status: tracking.status,
    flightNumber: tracking.flightNumber,
    confirmationNumber: tracking.confirmationNumber,
    currentLocation: tracking.currentLocation,
    lastUpdated: iso(tracking.updatedAt),
    statusHistory: tracking.statusHistory
  };
}

function requireUser(headers: Static<typeof UserHeaders>): string {
  const userId = headers['x-user-id']?.trim();
  if (!userId) {
    throw new UnauthenticatedError();
  }
  return userId;
}

function errorBody(error: BookingError): ErrorBody {
  const body: ErrorBody = { error: error.code, message: error.message };
  if (error instanceof CheckInNotYetAvailableError) {
    body.opensAt = iso(error.opensAt);
  }
  return body;
}

export const buildServer = async (services: AppServices, options: AppOptions) => {
  const fastifyLogger: FastifyBaseLogger = options.logger;
  const clock = options.clock ?? (() => new Date());
  const server = Fastify({
    logger: fastifyLogger,
    requestTimeout: options.requestTimeoutMs ?? 0
  });

  if (options.burstGuard !== false) {
    registerBurstGuard(server, options.burstGuard ?? { threshold: 30, windowMs: 5_000, blockMs: 10 * 60_000 });
  }

  const app = server.withTypeProvider<TypeBoxTypeProvider>();

  await app.register(cors, {
    origin: true
  });

  // swagger and rate-limit collect routes through onRoute, so they load first
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Flight Booking API',
        version: '0.1.0'
      }
    }
  });

  if (options.docs !== false) {
    await app.register(swaggerUi, {
      routePrefix: '/docs'
    });
  }

  await app.register(rateLimit, {
    global: false,
    max: 60,
    timeWindow: '1 minute'
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof BookingError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      } else {
        request.log.info({ code: error.code }, error.message);
      }
      return reply.code(error.statusCode).send(errorBody(error));
    }
    if (error.validation) {
      return reply.code(400).send({ error: 'VALIDATION_ERROR', message: error.message });
    }
    if (error.statusCode === 429) {
      return reply.code(429).send({ error: 'RATE_LIMITED', message: error.message });
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: 'BAD_REQUEST', message: error.message });
    }
    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({ error: 'INTERNAL_ERROR', message: 'Something went wrong. Please try again later.' });
  });

  app.setNotFoundHandler((request, reply) => {
    reply.code(404).send({ error: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` });
  });

  const flightOn = async (flightNumber: string, date: string | undefined) => {
    const normalized = normalizeFlightNumber(flightNumber);
    const flightDate = date ?? toFlightDate(clock());
    const flight = await services.flights.getFlightInstance(normalized, flightDate);
    if (!flight) {
      throw new FlightNotFoundError(normalized, flightDate);
    }
    return flight;
  };

  app.post('/bookings', {
    schema: {
      headers: UserHeaders,
      body: CreateBookingRequest,
      response: {
        200: BookingResponse
      }
    },
    config: {
      rateLimit: { max: 20, timeWindow: '1 minute' }
    }
  }, async (request) => {
    const userId = requireUser(request.headers);
    const { flightNumber, flightDate, passengers, selectedSeats, payment } = request.body;
    const booking = await services.bookings.createBooking({
      flightNumber,
      flightDate,
      userId,
      passengers: passengers.map((p) => ({
        firstName: p.firstName,
        lastName: p.lastName,
        dateOfBirth: p.dateOfBirth ? new Date(`${p.dateOfBirth}T00:00:00Z`) : null,
        seatClass: p.seatClass
      })),
      selectedSeats,
      payment
    });
    return {
      confirmationNumber: booking.confirmationNumber,
      status: booking.status,
      totalAmount: booking.totalAmount.toNumber(),
      createdAt: iso(booking.createdAt)
    };
  });

  app.get('/bookings/:confirmationNumber', {
    schema: {
      params: ConfirmationParams,
      response: {
        200: BookingDetailsResponse
      }
    }
  }, async (request) => {
    const booking = await services.bookings.getBooking(request.params.confirmationNumber);
    return bookingDetails(booking);
  });

  app.post('/bookings/:confirmationNumber/checkin', {
    schema: {
      params: ConfirmationParams,
      response: {
        200: CheckInResponse
      }
    },
    config: {
      rateLimit: { max: 20, timeWindow: '1 minute' }
    }
  }, async (request) => {
    const result = await services.bookings.checkIn(request.params.confirmationNumber);
    return {
      success: true as const,
      boardingPass: boardingPassDto(result.boardingPass),
      boardingPasses: result.boardingPasses.map(boardingPassDto)
    };
  });

  app.post('/bookings/:confirmationNumber/cancel', {
    schema: {
      headers: UserHeaders,
      params: ConfirmationParams,
      response: {
        200: CancelResponse
      }
    }
  }, async (request) => {
    const userId = requireUser(request.headers);
    const booking = await services.bookings.cancelBooking(request.params.confirmationNumber, userId);
    return {
      confirmationNumber: booking.confirmationNumber,
      status: booking.status,
      paymentStatus: booking.paymentStatus
    };
  });

  app.post('/bookings/:confirmationNumber/baggage', {
    schema: {
      params: ConfirmationParams,
      body: BaggageRequest,
      response: {
        200: BaggageItemDto
      }
    }
  }, async (request) => {
    const item = await services.baggage.addBaggage(request.params.confirmationNumber, {
      type: request.body.type ?? 'Checked',
      weightKg: request.body.weightKg
    });
    return baggageDto(item);
  });

  app.get('/baggage/:trackingNumber', {
    schema: {
      params: TrackingParams,
      response: {
        200: BaggageTrackingResponse
      }
    }
  }, async (request) => trackingDto(await services.baggage.trackBaggage(request.params.trackingNumber)));

  app.patch('/baggage/:trackingNumber', {
    schema: {
      params: TrackingParams,
      body: BaggageStatusRequest,
      response: {
        200: BaggageTrackingResponse
      }
    }
  }, async (request) =>
    trackingDto(await services.baggage.updateBaggageStatus(request.params.trackingNumber, request.body.status))
  );

  app.get('/flights/board', {
    schema: {
      querystring: FlightBoardQuery,
      response: {
        200: FlightBoardResponse
      }
    },
    config: {
      rateLimit: { max: 60, timeWindow: '1 minute' }
    }
  }, async (request) => {
    const { airport, search, status, airline } = request.query;
    const code = (airport ?? DEFAULT_BOARD_AIRPORT).toUpperCase();
    const flights = await services.flights.getFlightBoard(code, { search, status, airline });
    return {
      airport: code,
      flights: flights.map(flightSummary),
      totalCount: flights.length,
      lastUpdated: iso(clock())
    };
  });

  app.get('/flights/:flightNumber', {
    schema: {
      params: FlightParams,
      querystring: DateQuery,
      response: {
        200: FlightDetailsResponse
      }
    }
  }, async (request) => {
    const flight = await flightOn(request.params.flightNumber, request.query.date);
    return {
      flight: { ...flightSummary(flight), aircraft: flight.aircraft },
      lastUpdated: iso(clock())
    };
  });

  app.get('/flights/:flightNumber/seats', {
    schema: {
      params: FlightParams,
      querystring: DateQuery,
      response: {
        200: SeatMapResponse
      }
    },
    config: {
      rateLimit: { max: 60, timeWindow: '1 minute' }
    }
  }, async (request) => {
    const flightDate = request.query.date ?? toFlightDate(clock());
    const seatMap = await services.bookings.getSeatMap(request.params.flightNumber, flightDate);
    return seatMapDto(seatMap, flightDate);
  });

  app.get('/flights/:flightNumber/weather', {
    schema: {
      params: FlightParams,
      querystring: DateQuery,
      response: {
        200: WeatherResponse
      }
    }
  }, async (request) => {
    const flight = await flightOn(request.params.flightNumber, request.query.date);
    const [originWeather, destinationWeather] = await Promise.all([
      services.weather.getWeather(flight.originAirport),
      services.weather.getWeather(flight.destinationAirport)
    ]);
    return {
      flightNumber: flight.flightNumber,
      originAirport: flight.originAirport,
      destinationAirport: flight.destinationAirport,
      originWeather,
      destinationWeather,
      lastUpdated: iso(clock())
    };
  });

  app.get('/health', { schema: { response: { 200: HealthResponse } } }, async () => ({ status: 'ok' }));

  app.get('/ready', {
    schema: {
      response: {
        200: HealthResponse,
        503: HealthResponse
      }
    }
  }, async (request, reply) => {
    try {
      await services.checkReady();
      return { status: 'ok' };
    } catch (err) {
      request.log.warn({ err }, 'Readiness check failed');
      reply.code(503);
      return { status: 'unavailable' };
    }
  });

  return app;
};
