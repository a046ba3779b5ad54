import { BaggageService, PgBaggageStore } from './baggage-service.js';
import { BookingWorkflow } from './booking-service.js';
import { PgBookingStore } from './booking-store.js';
import { redis, RedisJsonCache } from './cache.js';
import { CodeGenerator } from './codes.js';
import { config, type AppConfig } from './config.js';
import { pool } from './db.js';
import { PgFlightDirectory } from './flight-service.js';
import { logger } from './logger.js';
import { LogNotificationSender, PgUserDirectory } from './notification.js';
import { SimulatedPaymentGateway } from './payment.js';
import { cryptoRandom } from './random.js';
import { PgSeatInventory } from './seat-service.js';
import { SimulatedWeatherProvider } from './weather.js';

/** Production wiring: Postgres stores, Redis cache and the simulated integrations. */
export function createContainer(cfg: AppConfig = config) {
  const cache = new RedisJsonCache(redis);
  const flights = new PgFlightDirectory(pool);
  const seats = new PgSeatInventory(pool, cache, {
    random: cryptoRandom,
    availableRatio: cfg.seatMap.availableRatio,
    cacheTtlSeconds: cfg.seatMap.cacheTtlSeconds
  });
  const bookingStore = new PgBookingStore(pool, logger, (flightId) => seats.invalidate(flightId));
  const codes = new CodeGenerator(cryptoRandom);

  const bookings = new BookingWorkflow({
    flights,
    seats,
    bookings: bookingStore,
    payments: new SimulatedPaymentGateway(
      {
        successRate: cfg.payment.successRate,
        refundSuccessRate: cfg.payment.refundSuccessRate,
        latencyMs: cfg.payment.latencyMs,
        random: cryptoRandom
      },
      logger
    ),
    notifications: new LogNotificationSender(logger),
    users: new PgUserDirectory(pool),
    codes,
    logger,
    options: cfg.booking
  });

  const baggage = new BaggageService({
    bookings: bookingStore,
    baggage: new PgBaggageStore(pool),
    codes,
    logger,
    maxTrackingAttempts: cfg.booking.maxConfirmationAttempts
  });

  return {
    pool,
    redis,
    flights,
    seats,
    bookings,
    baggage,
    weather: new SimulatedWeatherProvider(logger, cryptoRandom),
    checkReady: async () => {
      await pool.query('SELECT 1');
    },
    close: async () => {
      await bookings.whenIdle();
      await pool.end();
      redis.disconnect();
    }
  };
}

export type Container = ReturnType<typeof createContainer>;
