import { Inject, Injectable } from '@nestjs/common';
import { Booking } from '../../domain/aggregates/booking.aggregate';
import { BookingNotFoundError } from '../../domain/errors/booking.errors';
import { BOOKING_STORE } from '../../domain/repositories/booking-store.interface';
import type { ActiveBookingFilter, IBookingStore } from '../../domain/repositories/booking-store.interface';
import {
    BOOKING_STATUSES,
    BookingStatus,
    BookingStatusValue,
    STATUS_TRANSITIONS,
} from '../../domain/value-objects/booking-status.vo';
import { StayInterval } from '../../domain/value-objects/stay-interval.vo';
import { ConflictDetectorService } from './conflict-detector.service';

export interface BookingListQuery {
    status?: BookingStatusValue;
    /** Bookings whose stay overlaps `[start, end)`. */
    range?: { start: Date; end: Date };
    id?: string;
}

export interface BookingStates {
    statuses: readonly BookingStatusValue[];
    transitions: Readonly<Record<BookingStatusValue, readonly BookingStatusValue[]>>;
}

export interface BookingDetail {
    booking: Booking;
    /** Every non-cancelled booking competing for the same facilities. */
    clashes: Booking[];
}

@Injectable()
export class BookingQueryService {
    constructor(
        @Inject(BOOKING_STORE)
        private readonly bookingStore: IBookingStore,
        private readonly conflictDetector: ConflictDetectorService,
    ) { }

    async listBookings(query: BookingListQuery = {}): Promise<Booking[]> {
        const filter: ActiveBookingFilter = {};
        if (query.status) filter.statuses = [query.status];
        if (query.id) filter.id = query.id;
        if (query.range) {
            // Rejects an empty or inverted range.
            const interval = StayInterval.create(query.range.start, query.range.end);
            filter.overlapping = { start: interval.arriving, end: interval.departing };
        }

        const bookings = await this.bookingStore.listActive(filter);
        return bookings.sort((a, b) =>
            a.status.sortIndex - b.status.sortIndex
            || a.arriving.getTime() - b.arriving.getTime()
            || a.id.localeCompare(b.id));
    }

    getStates(): BookingStates {
        return {
            statuses: BOOKING_STATUSES,
            transitions: STATUS_TRANSITIONS,
        };
    }

    allowedTransitions(status: BookingStatusValue): readonly BookingStatusValue[] {
        return BookingStatus.of(status).allowedTargets;
    }

    async getBookingDetail(bookingId: string): Promise<BookingDetail> {
        const booking = await this.bookingStore.get(bookingId);
        if (!booking) {
            throw new BookingNotFoundError(bookingId);
        }
        const clashes = await this.conflictDetector.findClashesFor(booking);
        return { booking, clashes };
    }
}
