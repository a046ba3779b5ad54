import type pg from 'pg';
import { canMoveBaggage } from './booking-state.js';
import { mapBaggageRow, type BaggageRow, type BookingStore } from './booking-store.js';
import { type CodeGenerator, withUniqueCode } from './codes.js';
import { isUniqueViolation } from './db.js';
import {
  BaggageNotFoundError,
  BookingNotFoundError,
  DuplicateCodeError,
  InvalidBaggageStateError,
  InvalidBookingStateError,
  TrackingNumberCollisionError,
  ValidationError
} from './errors.js';
import type { Logger } from './logger.js';
import type { BaggageItem, BaggageStatus, BaggageType } from './types.js';

export const MAX_BAGGAGE_WEIGHT_KG = 50;

export type NewBaggageItem = {
  bookingId: number;
  trackingNumber: string;
  type: BaggageType;
  weightKg: number;
  status: BaggageStatus;
  createdAt: Date;
};

export type TrackedBaggage = BaggageItem & { flightNumber: string; confirmationNumber: string };

export interface BaggageStore {
  /** Throws `DuplicateCodeError` when the tracking number is taken. */
  insert(item: NewBaggageItem): Promise<BaggageItem>;
  findByTrackingNumber(trackingNumber: string): Promise<TrackedBaggage | null>;
  /** Returns `null` when the item is no longer in `from`. */
  updateStatus(trackingNumber: string, from: BaggageStatus, to: BaggageStatus, at: Date): Promise<BaggageItem | null>;
}

export type BaggageStatusUpdate = {
  status: BaggageStatus;
  location: string;
  description: string;
};

export type BaggageTracking = TrackedBaggage & {
  currentLocation: string;
  statusHistory: BaggageStatusUpdate[];
};

export function locationFor(status: BaggageStatus): string {
  switch (status) {
    case 'CheckedIn':
      return 'Check-in Counter';
    case 'InTransit':
      return 'In Transit to Aircraft';
    case 'Loaded':
      return 'Loaded on Aircraft';
    case 'Delivered':
      return 'Delivered to Baggage Claim';
    case 'Lost':
      return 'Lost - Under Investigation';
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown baggage status ${String(unreachable)}`);
    }
  }
}

const HISTORY: ReadonlyArray<[BaggageStatus, string]> = [
  ['CheckedIn', 'Checked in at airport'],
  ['InTransit', 'Transferred to aircraft loading area'],
  ['Loaded', 'Loaded onto aircraft'],
  ['Delivered', 'Delivered to baggage claim area']
];

/** Milestones reached so far; a lost bag keeps the milestones recorded before it went missing. */
export function statusHistory(status: BaggageStatus): BaggageStatusUpdate[] {
  if (status === 'Lost') {
    return [
      { status: 'CheckedIn', location: locationFor('CheckedIn'), description: 'Checked in at airport' },
      { status: 'Lost', location: locationFor('Lost'), description: 'Reported missing' }
    ];
  }
  const reached = HISTORY.findIndex(([s]) => s === status);
  return HISTORY.slice(0, reached + 1).map(([s, description]) => ({
    status: s,
    location: locationFor(s),
    description
  }));
}

export type BaggageServiceDeps = {
  bookings: BookingStore;
  baggage: BaggageStore;
  codes: CodeGenerator;
  logger: Logger;
  maxTrackingAttempts: number;
  clock?: () => Date;
};

export class BaggageService {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: BaggageServiceDeps) {
    this.logger = deps.logger.child({ component: 'baggage' });
    this.clock = deps.clock ?? (() => new Date());
  }

  async addBaggage(confirmationNumber: string, input: { type: BaggageType; weightKg: number }): Promise<BaggageItem> {
    if (!(input.weightKg > 0 && input.weightKg <= MAX_BAGGAGE_WEIGHT_KG)) {
      throw new ValidationError(`Baggage weight must be between 0 and ${MAX_BAGGAGE_WEIGHT_KG} kg`);
    }
    const booking = await this.deps.bookings.findByConfirmation(confirmationNumber.trim().toUpperCase());
    if (!booking) {
      throw new BookingNotFoundError(confirmationNumber);
    }
    if (booking.status !== 'Confirmed' && booking.status !== 'CheckedIn') {
      throw new InvalidBookingStateError(`Baggage cannot be added to a ${booking.status} booking`);
    }

    const item = await withUniqueCode(
      () => this.deps.codes.generateTrackingNumber(),
      (trackingNumber) =>
        this.deps.baggage.insert({
          bookingId: booking.id,
          trackingNumber,
          type: input.type,
          weightKg: input.weightKg,
          status: 'CheckedIn',
          createdAt: this.clock()
        }),
      this.deps.maxTrackingAttempts,
      (attempts) => new TrackingNumberCollisionError(attempts),
      (code, attempt) => this.logger.warn({ code, attempt }, 'Tracking number collision, regenerating')
    );
    this.logger.info({ trackingNumber: item.trackingNumber, confirmationNumber }, 'Baggage checked');
    return item;
  }

  async trackBaggage(trackingNumber: string): Promise<BaggageTracking> {
    const item = await this.find(trackingNumber);
    return {
      ...item,
      currentLocation: locationFor(item.status),
      statusHistory: statusHistory(item.status)
    };
  }

  async updateBaggageStatus(trackingNumber: string, status: BaggageStatus): Promise<BaggageTracking> {
    const item = await this.find(trackingNumber);
    if (!canMoveBaggage(item.status, status)) {
      throw new InvalidBaggageStateError(`Baggage cannot move from ${item.status} to ${status}`);
    }
    const updated = await this.deps.baggage.updateStatus(item.trackingNumber, item.status, status, this.clock());
    if (!updated) {
      throw new InvalidBaggageStateError('Baggage status changed concurrently; reload and retry');
    }
    this.logger.info({ trackingNumber: item.trackingNumber, from: item.status, to: status }, 'Baggage status updated');
    return {
      ...item,
      ...updated,
      currentLocation: locationFor(status),
      statusHistory: statusHistory(status)
    };
  }

  private async find(trackingNumber: string): Promise<TrackedBaggage> {
    const item = await this.deps.baggage.findByTrackingNumber(trackingNumber.trim().toUpperCase());
    if (!item) {
      throw new BaggageNotFoundError(trackingNumber);
    }
    return item;
  }
}

const TRACKING_CONSTRAINT = 'baggage_items_tracking_number_key';

const BAGGAGE_COLUMNS = 'baggage_id, booking_id, tracking_number, baggage_type, weight_kg, status, created_at, updated_at';

export class PgBaggageStore implements BaggageStore {
  constructor(private readonly db: pg.Pool) {}

  async insert(item: NewBaggageItem): Promise<BaggageItem> {
    try {
      const { rows } = await this.db.query<BaggageRow>(
        `INSERT INTO baggage_items (booking_id, tracking_number, baggage_type, weight_kg, status, created_at, updated_at)
         VALUES ($1,$2,$3,$4,$5,$6,$6)
         RETURNING ${BAGGAGE_COLUMNS}`,
        [item.bookingId, item.trackingNumber, item.type, item.weightKg, item.status, item.createdAt]
      );
      return mapBaggageRow(rows[0]);
    } catch (err) {
      if (isUniqueViolation(err, TRACKING_CONSTRAINT)) {
        throw new DuplicateCodeError(item.trackingNumber);
      }
      throw err;
    }
  }

  async findByTrackingNumber(trackingNumber: string): Promise<TrackedBaggage | null> {
    const { rows } = await this.db.query<BaggageRow & { flight_number: string; confirmation_number: string }>(
      `SELECT bi.baggage_id, bi.booking_id, bi.tracking_number, bi.baggage_type, bi.weight_kg, bi.status,
              bi.created_at, bi.updated_at, f.flight_number, b.confirmation_number
       FROM baggage_items bi
       JOIN bookings b ON b.booking_id = bi.booking_id
       JOIN flights f ON f.flight_id = b.flight_id
       WHERE bi.tracking_number=$1`,
      [trackingNumber]
    );
    if (rows.length === 0) {
      return null;
    }
    const row = rows[0];
    return { ...mapBaggageRow(row), flightNumber: row.flight_number, confirmationNumber: row.confirmation_number };
  }

  async updateStatus(
    trackingNumber: string,
    from: BaggageStatus,
    to: BaggageStatus,
    at: Date
  ): Promise<BaggageItem | null> {
    const { rows } = await this.db.query<BaggageRow>(
      `UPDATE baggage_items SET status=$3, updated_at=$4
       WHERE tracking_number=$1 AND status=$2
       RETURNING ${BAGGAGE_COLUMNS}`,
      [trackingNumber, from, to, at]
    );
    return rows.length > 0 ? mapBaggageRow(rows[0]) : null;
  }
}
