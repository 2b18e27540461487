import type { Booking } from '../aggregates/booking.aggregate';
import type { BookingStatusValue } from '../value-objects/booking-status.vo';
import { FacilitySet } from '../value-objects/facility-set.vo';
import { StayInterval } from '../value-objects/stay-interval.vo';

export interface ClashQuery {
    facilities: FacilitySet;
    interval: StayInterval;
    excludeBookingId?: string;
    /** Restricts matches to these statuses; Cancelled never matches. */
    statuses?: readonly BookingStatusValue[];
}

/**
 * Domain Policy: Facility Clash
 * Two bookings clash when neither is cancelled, they share a facility and their
 * half-open stay intervals overlap.
 */
export class ClashPolicy {
    static clashes(candidate: Booking, query: ClashQuery): boolean {
        if (candidate.id === query.excludeBookingId) return false;
        if (candidate.status.isCancelled) return false;
        if (query.statuses && !query.statuses.includes(candidate.status.value)) return false;
        if (!candidate.facilities.intersects(query.facilities)) return false;
        return candidate.stay.overlaps(query.interval);
    }

    /**
     * Filters candidates down to clashes, ordered by arrival then id.
     */
    static findClashes(candidates: readonly Booking[], query: ClashQuery): Booking[] {
        return candidates
            .filter(candidate => this.clashes(candidate, query))
            .sort((a, b) => this.compare(a, b));
    }

    static compare(a: Booking, b: Booking): number {
        const byArrival = a.arriving.getTime() - b.arriving.getTime();
        if (byArrival !== 0) return byArrival;
        if (a.id === b.id) return 0;
        return a.id < b.id ? -1 : 1;
    }
}
