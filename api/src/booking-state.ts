import { InvalidBookingStateError } from './errors.js';
import type { BaggageStatus, BookingStatus } from './types.js';

/** Statuses each booking status may move to. */
export function nextBookingStatuses(status: BookingStatus): readonly BookingStatus[] {
  switch (status) {
    case 'Pending':
      return ['Confirmed', 'Cancelled'];
    case 'Confirmed':
      return ['CheckedIn', 'Cancelled'];
    case 'CheckedIn':
      return ['Completed'];
    case 'Completed':
    case 'Cancelled':
      return [];
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown booking status ${String(unreachable)}`);
    }
  }
}

export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
  return nextBookingStatuses(from).includes(to);
}

export function assertTransition(from: BookingStatus, to: BookingStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidBookingStateError(describeRejectedTransition(from, to));
  }
}

/** Source statuses from which `to` is reachable; used in conditional updates. */
export function statusesLeadingTo(to: BookingStatus, all: readonly BookingStatus[]): BookingStatus[] {
  return all.filter((from) => canTransition(from, to));
}

export function isTerminal(status: BookingStatus): boolean {
  return nextBookingStatuses(status).length === 0;
}

function describeRejectedTransition(from: BookingStatus, to: BookingStatus): string {
  switch (to) {
    case 'CheckedIn':
      return from === 'CheckedIn'
        ? 'This booking is already checked in'
        : `Bookings in status ${from} cannot be checked in`;
    case 'Cancelled':
      return `Bookings in status ${from} cannot be cancelled`;
    case 'Completed':
      return `Bookings in status ${from} cannot be completed`;
    case 'Confirmed':
      return `Bookings in status ${from} cannot be confirmed`;
    case 'Pending':
      return 'Bookings cannot return to Pending';
    default: {
      const unreachable: never = to;
      throw new Error(`Unknown booking status ${String(unreachable)}`);
    }
  }
}

const BAGGAGE_PROGRESSION: readonly BaggageStatus[] = ['CheckedIn', 'InTransit', 'Loaded', 'Delivered'];

export function canMoveBaggage(from: BaggageStatus, to: BaggageStatus): boolean {
  switch (to) {
    case 'Lost':
      return from !== 'Delivered' && from !== 'Lost';
    case 'CheckedIn':
    case 'InTransit':
    case 'Loaded':
    case 'Delivered':
      return from !== 'Lost' && BAGGAGE_PROGRESSION.indexOf(to) === BAGGAGE_PROGRESSION.indexOf(from) + 1;
    default: {
      const unreachable: never = to;
      throw new Error(`Unknown baggage status ${String(unreachable)}`);
    }
  }
}
