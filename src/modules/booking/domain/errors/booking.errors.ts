import type { BookingStatusValue } from '../value-objects/booking-status.vo';

export type BookingErrorCode =
    | 'NotFound'
    | 'InvalidTransition'
    | 'ConflictBlocked'
    | 'ReadOnly'
    | 'InvalidFieldValue'
    | 'MalformedRow'
    | 'StoreUnavailable';

export interface ClashSummary {
    bookingId: string;
    groupName: string;
    status: BookingStatusValue;
    facilities: string[];
    arriving: Date;
    departing: Date;
}

/**
 * Base class of every failure surfaced by the booking core.
 * Callers get a short structured reason plus the offending booking id.
 */
export abstract class BookingDomainError extends Error {
    abstract readonly code: BookingErrorCode;

    protected constructor(
        public readonly reason: string,
        public readonly bookingId?: string,
    ) {
        super(bookingId ? `${reason} (booking ${bookingId})` : reason);
        this.name = new.target.name;
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            reason: this.reason,
            bookingId: this.bookingId,
        };
    }
}

export class BookingNotFoundError extends BookingDomainError {
    readonly code = 'NotFound' as const;

    constructor(bookingId: string) {
        super('Booking not found', bookingId);
    }
}

export class InvalidTransitionError extends BookingDomainError {
    readonly code = 'InvalidTransition' as const;

    constructor(
        bookingId: string,
        public readonly from: BookingStatusValue,
        public readonly to: BookingStatusValue,
        reason: string,
    ) {
        super(reason, bookingId);
    }
}

export class ConflictBlockedError extends BookingDomainError {
    readonly code = 'ConflictBlocked' as const;

    constructor(
        bookingId: string,
        public readonly clashes: ClashSummary[],
    ) {
        super(`Clashes with ${clashes.map(clash => clash.bookingId).join(', ')}`, bookingId);
    }

    toJSON(): Record<string, unknown> {
        return {
            ...super.toJSON(),
            clashes: this.clashes.map(clash => clash.bookingId),
        };
    }
}

export class ReadOnlyBookingError extends BookingDomainError {
    readonly code = 'ReadOnly' as const;

    constructor(bookingId: string, public readonly status: BookingStatusValue) {
        super(`Booking is read-only while ${status}`, bookingId);
    }
}

export class InvalidFieldValueError extends BookingDomainError {
    readonly code = 'InvalidFieldValue' as const;

    constructor(
        public readonly problems: string[],
        bookingId?: string,
    ) {
        super(`Invalid field values: ${problems.join('; ')}`, bookingId);
    }
}

export class MalformedRowError extends BookingDomainError {
    readonly code = 'MalformedRow' as const;

    constructor(
        public readonly rowIndex: number,
        public readonly detail: string,
    ) {
        super(`Row ${rowIndex}: ${detail}`);
    }
}

export class StoreUnavailableError extends BookingDomainError {
    readonly code = 'StoreUnavailable' as const;

    constructor(
        public readonly operation: string,
        public readonly underlying?: unknown,
        bookingId?: string,
    ) {
        super(`Booking store unavailable during ${operation}`, bookingId);
    }
}
