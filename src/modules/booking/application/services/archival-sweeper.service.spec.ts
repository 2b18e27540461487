import { ArchivalPolicy } from '../../domain/policies/archival.policy';
import { InMemoryBookingStore } from '../../infrastructure/persistence/in-memory-booking.store';
import { BookingTestContext, createBookingTestContext, makeBooking } from '../../testing/booking.fixtures';

describe('ArchivalSweeperService', () => {
    const now = new Date('2025-10-01T00:00:00Z');
    const retention = ArchivalPolicy.retentionFromDays(90);
    // now - retention
    const cutoff = new Date('2025-07-03T00:00:00Z');
    const justBefore = new Date(cutoff.getTime() - 1);

    let store: InMemoryBookingStore;
    let ctx: BookingTestContext;

    beforeEach(async () => {
        store = new InMemoryBookingStore();
        ctx = await createBookingTestContext(store);
    });

    afterEach(async () => {
        await ctx.module.close();
    });

    const stay = (departing: Date) => ({
        arriving: new Date(departing.getTime() - 2 * 24 * 60 * 60 * 1000),
        departing,
    });

    it('archives terminal bookings strictly older than the retention window', async () => {
        const notes = [
            { at: new Date('2025-06-01T10:00:00Z'), actor: 'system', text: 'Pulled from source' },
            { at: new Date('2025-06-02T10:00:00Z'), actor: 'warden', text: 'Status changed [New] > [Cancelled] - Cancel reason: Rain' },
        ];
        await store.create(makeBooking({ id: 'old-cancelled', externalKey: 'a', ...stay(justBefore) }, { status: 'Cancelled', cancelReason: 'Rain', notes }));
        await store.create(makeBooking({ id: 'old-completed', externalKey: 'b', ...stay(justBefore) }, { status: 'Completed' }));
        await store.create(makeBooking({ id: 'at-cutoff', externalKey: 'c', ...stay(cutoff) }, { status: 'Completed' }));
        await store.create(makeBooking({ id: 'old-invoice', externalKey: 'd', ...stay(justBefore) }, { status: 'Invoice' }));

        const count = await ctx.sweeper.sweep(now, retention);

        expect(count).toBe(2);
        expect((await store.listActive()).map(booking => booking.id).sort()).toEqual(['at-cutoff', 'old-invoice']);

        const archived = await store.getArchived('old-cancelled');
        expect(archived?.tracking.notes).toEqual(notes);
        expect(archived?.tracking.cancelReason).toBe('Rain');
    });

    it('archives nothing on a second run', async () => {
        await store.create(makeBooking({ id: 'old', ...stay(justBefore) }, { status: 'Completed' }));

        expect(await ctx.sweeper.sweep(now, retention)).toBe(1);
        expect(await ctx.sweeper.sweep(now, retention)).toBe(0);
        expect(store.archivedCount).toBe(1);
    });

    it('leaves a booking that was reinstated after selection', async () => {
        await store.create(makeBooking({ id: 'old', ...stay(justBefore) }, { status: 'Cancelled', cancelReason: 'Rain' }));
        const listActive = store.listActive.bind(store);
        jest.spyOn(store, 'listActive').mockImplementationOnce(async (filter) => {
            const selected = await listActive(filter);
            const reinstated = makeBooking({ id: 'old', ...stay(justBefore) });
            await store.updateTracking(reinstated);
            return selected;
        });

        expect(await ctx.sweeper.sweep(now, retention)).toBe(0);
        expect((await store.get('old'))?.status.value).toBe('New');
    });
});
