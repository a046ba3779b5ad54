import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildServer, type AppOptions } from '../src/app.js';
import type { WeatherProvider } from '../src/weather.js';
import { createHarness, NOW, silentLogger, USER_ID, type Harness } from './helpers/fixtures.js';

const sunny = {
  location: 'ORD',
  temperatureC: 21,
  conditions: 'Clear',
  visibilityKm: 10,
  windSpeedKph: 12,
  windDirection: 'NW'
};

const weather: WeatherProvider = {
  getWeather: async (airportCode) => (airportCode === 'ORD' ? sunny : null)
};

const bookingBody = {
  flightNumber: 'AA123',
  flightDate: '2030-03-11',
  passengers: [
    { firstName: 'Ada', lastName: 'Lovelace', seatClass: 'Economy' },
    { firstName: 'Alan', lastName: 'Turing', seatClass: 'Business' }
  ],
  selectedSeats: ['14A', '3B']
};

type TestApp = Awaited<ReturnType<typeof buildServer>>;

let app: TestApp | undefined;

async function setup(
  options: Partial<AppOptions> = {},
  checkReady: () => Promise<void> = async () => undefined
): Promise<{ h: Harness; server: TestApp }> {
  const h = createHarness();
  const server = await buildServer(
    { bookings: h.workflow, baggage: h.baggage, flights: h.flights, weather, checkReady },
    { logger: silentLogger, docs: false, burstGuard: false, clock: () => h.clock.now, ...options }
  );
  app = server;
  return { h, server };
}

async function book(server: TestApp, body: object = bookingBody) {
  return server.inject({ method: 'POST', url: '/bookings', headers: { 'x-user-id': USER_ID }, payload: body });
}

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe('POST /bookings', () => {
  it('creates a booking', async () => {
    const { server } = await setup();

    const res = await book(server);

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toEqual({
      confirmationNumber: expect.stringMatching(/^[A-Z0-9]{6}$/),
      status: 'Confirmed',
      totalAmount: 1049.97,
      createdAt: NOW.toISOString()
    });
  });

  it('requires a user', async () => {
    const { server } = await setup();
    const res = await server.inject({ method: 'POST', url: '/bookings', payload: bookingBody });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: 'UNAUTHENTICATED', message: 'Authentication required' });
  });

  it('answers schema violations with 400', async () => {
    const { server } = await setup();
    const res = await book(server, { ...bookingBody, passengers: [{ firstName: 'Ada', lastName: 'Lovelace' }] });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('VALIDATION_ERROR');
  });

  it('answers a taken seat with 409', async () => {
    const { server } = await setup();
    await book(server);

    const res = await book(server);

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: 'SEAT_UNAVAILABLE', message: 'Seat 14A is no longer available' });
  });

  it('answers a failed save with 500', async () => {
    const { h, server } = await setup();
    h.bookings.failNextInsert = new Error('connection reset');

    const res = await book(server);

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: 'BOOKING_PERSISTENCE_FAILED',
      message: 'Booking could not be saved. Please try again later.'
    });
  });
});

describe('booking lifecycle routes', () => {
  it('returns booking details', async () => {
    const { server } = await setup();
    const { confirmationNumber } = (await book(server)).json<{ confirmationNumber: string }>();

    const res = await server.inject({ method: 'GET', url: `/bookings/${confirmationNumber}` });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.paymentStatus).toBe('Completed');
    expect(body.flight.flightNumber).toBe('AA123');
    expect(body.passengers).toEqual([
      { firstName: 'Ada', lastName: 'Lovelace', seatNumber: '14A', seatClass: 'Economy', checkedIn: false, checkInTime: null },
      { firstName: 'Alan', lastName: 'Turing', seatNumber: '3B', seatClass: 'Business', checkedIn: false, checkInTime: null }
    ]);
  });

  it('returns 404 for an unknown booking', async () => {
    const { server } = await setup();
    const res = await server.inject({ method: 'GET', url: '/bookings/NOPE00' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'BOOKING_NOT_FOUND', message: 'Booking NOPE00 not found' });
  });

  it('tells the caller when check-in opens', async () => {
    const { server } = await setup();
    const { confirmationNumber } = (await book(server)).json<{ confirmationNumber: string }>();

    const res = await server.inject({ method: 'POST', url: `/bookings/${confirmationNumber}/checkin` });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'CHECKIN_NOT_YET_AVAILABLE',
      message: 'Check-in not yet available. Opens at 2030-03-10T15:00:00.000Z.',
      opensAt: '2030-03-10T15:00:00.000Z'
    });
  });

  it('checks in and returns boarding passes', async () => {
    const { h, server } = await setup();
    const { confirmationNumber } = (await book(server)).json<{ confirmationNumber: string }>();
    h.clock.now = new Date('2030-03-11T03:00:00Z');

    const res = await server.inject({ method: 'POST', url: `/bookings/${confirmationNumber}/checkin` });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.success).toBe(true);
    expect(body.boardingPass.seatNumber).toBe('14A');
    expect(body.boardingPass.boardingTime).toBe('2030-03-11T14:30:00.000Z');
    expect(body.boardingPasses).toHaveLength(2);

    const again = await server.inject({ method: 'POST', url: `/bookings/${confirmationNumber}/checkin` });
    expect(again.statusCode).toBe(409);
    expect(again.json()).toEqual({ error: 'INVALID_STATE', message: 'This booking is already checked in' });
  });

  it('lets only the owner cancel', async () => {
    const { server } = await setup();
    const { confirmationNumber } = (await book(server)).json<{ confirmationNumber: string }>();

    const stranger = await server.inject({
      method: 'POST',
      url: `/bookings/${confirmationNumber}/cancel`,
      headers: { 'x-user-id': 'someone-else' }
    });
    expect(stranger.statusCode).toBe(403);

    const owner = await server.inject({
      method: 'POST',
      url: `/bookings/${confirmationNumber}/cancel`,
      headers: { 'x-user-id': USER_ID }
    });
    expect(owner.statusCode).toBe(200);
    expect(owner.json()).toEqual({ confirmationNumber, status: 'Cancelled', paymentStatus: 'Refunded' });
  });
});

describe('baggage routes', () => {
  it('adds, tracks and rejects an illegal move', async () => {
    const { server } = await setup();
    const { confirmationNumber } = (await book(server)).json<{ confirmationNumber: string }>();

    const added = await server.inject({
      method: 'POST',
      url: `/bookings/${confirmationNumber}/baggage`,
      payload: { weightKg: 20 }
    });
    expect(added.statusCode).toBe(200);
    const { trackingNumber, type, status } = added.json<{ trackingNumber: string; type: string; status: string }>();
    expect(type).toBe('Checked');
    expect(status).toBe('CheckedIn');

    const tracked = await server.inject({ method: 'GET', url: `/baggage/${trackingNumber}` });
    expect(tracked.json().currentLocation).toBe('Check-in Counter');

    const skipped = await server.inject({
      method: 'PATCH',
      url: `/baggage/${trackingNumber}`,
      payload: { status: 'Loaded' }
    });
    expect(skipped.statusCode).toBe(409);
    expect(skipped.json()).toEqual({
      error: 'INVALID_BAGGAGE_STATE',
      message: 'Baggage cannot move from CheckedIn to Loaded'
    });
  });

  it('rejects an overweight bag', async () => {
    const { server } = await setup();
    const { confirmationNumber } = (await book(server)).json<{ confirmationNumber: string }>();

    const res = await server.inject({
      method: 'POST',
      url: `/bookings/${confirmationNumber}/baggage`,
      payload: { type: 'Checked', weightKg: 51 }
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'VALIDATION_ERROR', message: 'Baggage weight must be between 0 and 50 kg' });
  });
});

describe('flight routes', () => {
  it('returns the seat map', async () => {
    const { server } = await setup();

    const res = await server.inject({ method: 'GET', url: '/flights/AA123/seats?date=2030-03-11' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.flightNumber).toBe('AA123');
    expect(body.availableSeats).toBe(180);
    expect(body.rows).toHaveLength(30);
    expect(body.rows[0].seats[0]).toEqual({ number: '1A', seatClass: 'First', isAvailable: true });
  });

  it('returns 404 for an unknown flight', async () => {
    const { server } = await setup();
    const res = await server.inject({ method: 'GET', url: '/flights/ZZ999?date=2030-03-11' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'FLIGHT_NOT_FOUND', message: 'Flight ZZ999 not found for 2030-03-11' });
  });

  it('defaults the date to today', async () => {
    const { h, server } = await setup();
    h.clock.now = new Date('2030-03-11T01:00:00Z');

    const res = await server.inject({ method: 'GET', url: '/flights/aa123' });

    expect(res.statusCode).toBe(200);
    expect(res.json().flight.aircraft).toBe('Boeing 737-800');
  });

  it('lists the board for an airport', async () => {
    const { server } = await setup();
    const res = await server.inject({ method: 'GET', url: '/flights/board?airport=lax' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ airport: 'LAX', totalCount: 1 });
  });

  it('reports weather for both ends, null when unavailable', async () => {
    const { server } = await setup();
    const res = await server.inject({ method: 'GET', url: '/flights/AA123/weather?date=2030-03-11' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ originWeather: sunny, destinationWeather: null });
  });

  it('hides internal errors', async () => {
    const { h, server } = await setup();
    vi.spyOn(h.flights, 'getFlightBoard').mockRejectedValue(new Error('relation "flights" does not exist'));

    const res = await server.inject({ method: 'GET', url: '/flights/board' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'INTERNAL_ERROR', message: 'Something went wrong. Please try again later.' });
  });
});

describe('operational routes', () => {
  it('reports liveness and readiness', async () => {
    const { server } = await setup({}, async () => {
      throw new Error('database unreachable');
    });

    expect((await server.inject({ method: 'GET', url: '/health' })).json()).toEqual({ status: 'ok' });
    const ready = await server.inject({ method: 'GET', url: '/ready' });
    expect(ready.statusCode).toBe(503);
    expect(ready.json()).toEqual({ status: 'unavailable' });
  });

  it('answers unknown routes with 404', async () => {
    const { server } = await setup();
    const res = await server.inject({ method: 'GET', url: '/nowhere' });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe('NOT_FOUND');
  });

  it('blocks an address after a burst', async () => {
    const { server } = await setup({ burstGuard: { threshold: 2, windowMs: 5_000, blockMs: 60_000 } });

    for (let i = 0; i < 2; i++) {
      expect((await server.inject({ method: 'GET', url: '/health' })).statusCode).toBe(200);
    }
    const blocked = await server.inject({ method: 'GET', url: '/health' });

    expect(blocked.statusCode).toBe(429);
    expect(blocked.json()).toEqual({ error: 'RATE_LIMITED', message: 'Burst limit exceeded' });
  });
});
