import { Inject, Injectable } from '@nestjs/common';
import { Booking } from '../../domain/aggregates/booking.aggregate';
import { ClashSummary } from '../../domain/errors/booking.errors';
import { ClashPolicy } from '../../domain/policies/clash.policy';
import { BOOKING_STORE } from '../../domain/repositories/booking-store.interface';
import type { IBookingStore } from '../../domain/repositories/booking-store.interface';
import { BookingStatusValue } from '../../domain/value-objects/booking-status.vo';
import { FacilitySet } from '../../domain/value-objects/facility-set.vo';
import { StayInterval } from '../../domain/value-objects/stay-interval.vo';

/**
 * Answers which active bookings compete with a stay for the same facilities.
 * Read-only; callers that act on the answer hold the facility locks.
 */
@Injectable()
export class ConflictDetectorService {
    constructor(
        @Inject(BOOKING_STORE)
        private readonly bookingStore: IBookingStore,
    ) { }

    async findClashes(
        facilities: FacilitySet,
        interval: StayInterval,
        excludeBookingId?: string,
        statuses?: readonly BookingStatusValue[],
    ): Promise<Booking[]> {
        if (facilities.isEmpty) return [];

        const candidates = await this.bookingStore.listActive({
            facilities: facilities.values,
            overlapping: { start: interval.arriving, end: interval.departing },
            excludeStatuses: ['Cancelled'],
            statuses,
        });

        return ClashPolicy.findClashes(candidates, {
            facilities,
            interval,
            excludeBookingId,
            statuses,
        });
    }

    /** Clashes of an existing booking with every other non-cancelled booking. */
    findClashesFor(booking: Booking, statuses?: readonly BookingStatusValue[]): Promise<Booking[]> {
        return this.findClashes(booking.facilities, booking.stay, booking.id, statuses);
    }

    static toSummary(booking: Booking): ClashSummary {
        return {
            bookingId: booking.id,
            groupName: booking.groupName,
            status: booking.status.value,
            facilities: booking.facilities.values,
            arriving: booking.arriving,
            departing: booking.departing,
        };
    }
}
