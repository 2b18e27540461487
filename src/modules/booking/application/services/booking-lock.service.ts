import { Injectable } from '@nestjs/common';
import { KeyedMutex } from '../../../../shared/infrastructure/keyed-mutex';

/**
 * Process-wide locks of the booking core. Lock order is always the booking
 * first, then its facilities in sorted order.
 */
@Injectable()
export class BookingLockService {
    private readonly mutex = new KeyedMutex();

    withBooking<T>(bookingId: string, task: () => Promise<T>): Promise<T> {
        return this.mutex.runExclusive(`booking:${bookingId}`, task);
    }

    withFacilities<T>(facilities: Iterable<string>, task: () => Promise<T>): Promise<T> {
        const keys = [...facilities].map(facility => `facility:${facility}`);
        return this.mutex.runExclusiveAll(keys, task);
    }

    /** Serialises whole passes (reconciliation, sweep) by name. */
    withPass<T>(name: string, task: () => Promise<T>): Promise<T> {
        return this.mutex.runExclusive(`pass:${name}`, task);
    }

    isBookingLocked(bookingId: string): boolean {
        return this.mutex.isLocked(`booking:${bookingId}`);
    }
}
