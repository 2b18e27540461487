import type { Booking } from '../aggregates/booking.aggregate';
import type { BookingStatusValue } from '../value-objects/booking-status.vo';

export const BOOKING_STORE = Symbol('BOOKING_STORE');

export interface ActiveBookingFilter {
    id?: string;
    statuses?: readonly BookingStatusValue[];
    excludeStatuses?: readonly BookingStatusValue[];
    /** Any shared facility matches. */
    facilities?: readonly string[];
    /** Half-open overlap with `[start, end)`. */
    overlapping?: { start: Date; end: Date };
    /** Departing strictly before this instant. */
    departingBefore?: Date;
}

export interface ExternalKeyMatch {
    booking: Booking;
    archived: boolean;
}

/**
 * Durable keyed storage for bookings and their tracking records.
 *
 * Adapters report a missing row with StoreNotFoundError, a uniqueness
 * violation (id or external key) with StoreConflictError and any
 * connectivity failure with StoreUnavailableError.
 */
export interface IBookingStore {
    create(booking: Booking): Promise<void>;
    get(id: string): Promise<Booking | null>;
    /** Looks in the active set first, then in the archive. */
    getByExternalKey(externalKey: string): Promise<ExternalKeyMatch | null>;
    updateTracking(booking: Booking): Promise<void>;
    /** Persists booking fields together with the tracking record so edit notes commit with the edit. */
    updateBookingFields(booking: Booking): Promise<void>;
    listActive(filter?: ActiveBookingFilter): Promise<Booking[]>;
    moveToArchive(id: string): Promise<void>;
    getArchived(id: string): Promise<Booking | null>;
}
