import { makeBooking } from '../../testing/booking.fixtures';
import { ArchivalPolicy } from './archival.policy';

describe('ArchivalPolicy', () => {
    const now = new Date('2025-10-01T00:00:00Z');
    const retention = ArchivalPolicy.retentionFromDays(90);

    it('computes the cutoff from the retention window', () => {
        expect(ArchivalPolicy.cutoff(now, retention).toISOString()).toBe('2025-07-03T00:00:00.000Z');
    });

    it('archives terminal bookings that departed before the cutoff', () => {
        const completed = makeBooking({
            arriving: new Date('2025-06-01T00:00:00Z'),
            departing: new Date('2025-07-02T23:59:59Z'),
        }, { status: 'Completed' });
        expect(ArchivalPolicy.isArchivable(completed, now, retention)).toBe(true);
    });

    it('keeps a booking departing exactly at the cutoff', () => {
        const cancelled = makeBooking({
            arriving: new Date('2025-07-01T00:00:00Z'),
            departing: new Date('2025-07-03T00:00:00Z'),
        }, { status: 'Cancelled', cancelReason: 'Plans changed' });
        expect(ArchivalPolicy.isArchivable(cancelled, now, retention)).toBe(false);
    });

    it('never archives bookings still in progress', () => {
        const invoice = makeBooking({
            arriving: new Date('2025-01-01T00:00:00Z'),
            departing: new Date('2025-01-03T00:00:00Z'),
        }, { status: 'Invoice' });
        expect(ArchivalPolicy.isArchivable(invoice, now, retention)).toBe(false);
    });
});
