import type { FlightDirectory } from './flight-service.js';
import type { Logger } from './logger.js';
import { chance, cryptoRandom, pick, type RandomSource } from './random.js';
import type { FlightInstance, FlightStatus } from './types.js';

export type FlightChange =
  | { kind: 'delay'; minutes: number }
  | { kind: 'gate'; gate: string; terminal: string }
  | { kind: 'status'; status: FlightStatus };

export type FlightSimulatorOptions = {
  batchSize: number;
  changeProbability: number;
  random?: RandomSource;
  clock?: () => Date;
};

const SIMULATED_STATUSES: readonly FlightStatus[] = ['OnTime', 'Delayed', 'Boarding'];

/**
 * Status a flight must have reached by `now`: InFlight once past its
 * departure, Arrived once past its arrival. Estimates win over schedule.
 */
export function progressedStatus(flight: FlightInstance, now: Date): FlightStatus | null {
  const arrival = flight.estimatedArrival ?? flight.scheduledArrival;
  const departure = flight.estimatedDeparture ?? flight.scheduledDeparture;
  if (now.getTime() >= arrival.getTime()) {
    return 'Arrived';
  }
  if (now.getTime() >= departure.getTime()) {
    return flight.status === 'InFlight' ? null : 'InFlight';
  }
  return null;
}

/**
 * Stands in for a live flight-data feed: every tick moves flights whose
 * departure or arrival time has passed, then nudges a few upcoming flights
 * with a delay, a gate change or a new status.
 */
export class FlightSimulator {
  private readonly random: RandomSource;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly flights: FlightDirectory,
    logger: Logger,
    private readonly options: FlightSimulatorOptions = { batchSize: 5, changeProbability: 0.1 }
  ) {
    this.random = options.random ?? cryptoRandom;
    this.clock = options.clock ?? (() => new Date());
    this.logger = logger.child({ component: 'flight-simulator' });
  }

  drawChange(): FlightChange {
    switch (this.random.int(3)) {
      case 0:
        return { kind: 'delay', minutes: 15 + this.random.int(106) };
      case 1:
        return { kind: 'gate', gate: `B${1 + this.random.int(9)}`, terminal: '2' };
      default:
        return { kind: 'status', status: pick(this.random, SIMULATED_STATUSES) };
    }
  }

  /** Returns the number of flights changed. */
  async tick(): Promise<number> {
    const upcoming = await this.flights.listUpcoming(this.options.batchSize);
    const now = this.clock();
    let changed = 0;
    for (const flight of upcoming) {
      const progressed = progressedStatus(flight, now);
      if (progressed) {
        await this.apply(flight, { kind: 'status', status: progressed });
        changed += 1;
        continue;
      }
      if (flight.status === 'InFlight' || !chance(this.random, this.options.changeProbability)) {
        continue;
      }
      await this.apply(flight, this.drawChange());
      changed += 1;
    }
    return changed;
  }

  private async apply(flight: FlightInstance, change: FlightChange): Promise<void> {
    switch (change.kind) {
      case 'delay':
        await this.flights.applyDelay(flight.id, change.minutes);
        break;
      case 'gate':
        await this.flights.updateGate(flight.id, change.gate, change.terminal);
        break;
      case 'status':
        await this.flights.updateStatus(flight.id, change.status);
        break;
      default: {
        const unreachable: never = change;
        throw new Error(`Unknown flight change ${JSON.stringify(unreachable)}`);
      }
    }
    this.logger.info({ flightNumber: flight.flightNumber, change }, 'Flight updated');
  }
}
