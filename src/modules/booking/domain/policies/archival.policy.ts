import type { Booking } from '../aggregates/booking.aggregate';

/**
 * Domain Policy: Archival
 * Terminal bookings leave the active set once their departure is older than the retention window.
 */
export class ArchivalPolicy {
    private static readonly DAY_MS = 24 * 60 * 60 * 1000;

    static cutoff(now: Date, retentionMs: number): Date {
        return new Date(now.getTime() - retentionMs);
    }

    static retentionFromDays(days: number): number {
        return days * this.DAY_MS;
    }

    static isArchivable(booking: Booking, now: Date, retentionMs: number): boolean {
        if (!booking.status.isArchivable) return false;
        return booking.stay.endsBefore(this.cutoff(now, retentionMs));
    }
}
