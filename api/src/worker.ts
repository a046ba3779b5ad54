import { reconcileSeatMaps } from './cache-reconcile.js';
import { config } from './config.js';
import { createContainer } from './container.js';
import { FlightSimulator } from './flight-simulator.js';
import { logger } from './logger.js';

const log = logger.child({ component: 'worker' });

function loop(fn: () => Promise<unknown>, name: string, interval: number) {
  const run = async () => {
    try {
      const res = await fn();
      if (typeof res === 'number' && res > 0) {
        log.info({ job: name, processed: res }, 'Job finished');
      }
    } catch (err) {
      log.error({ err, job: name }, 'Job failed');
    } finally {
      setTimeout(() => void run(), interval);
    }
  };
  void run();
}

const container = createContainer();
const simulator = new FlightSimulator(container.flights, logger);

loop(() => simulator.tick(), 'flightUpdates', config.worker.flightUpdateIntervalMs);
loop(() => container.bookings.completeArrivedBookings(), 'completeArrived', config.worker.completionIntervalMs);
loop(
  () => reconcileSeatMaps(container.pool, container.flights, container.seats),
  'reconcileSeatMaps',
  config.worker.reconcileIntervalMs
);
