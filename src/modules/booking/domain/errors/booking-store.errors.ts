/**
 * Raised by BookingStore adapters. Unavailability is reported with
 * StoreUnavailableError from booking.errors so it reaches callers unchanged.
 */
export class StoreNotFoundError extends Error {
    constructor(public readonly bookingId: string) {
        super(`No booking stored under ${bookingId}`);
        this.name = 'StoreNotFoundError';
    }
}

export class StoreConflictError extends Error {
    constructor(
        public readonly key: string,
        public readonly constraint: 'id' | 'external_key',
    ) {
        super(`Booking with ${constraint} ${key} already exists`);
        this.name = 'StoreConflictError';
    }
}
