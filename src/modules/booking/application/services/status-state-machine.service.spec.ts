import { BOOKING_STATUS_CHANGED } from '../../domain/events/booking-status-changed.event';
import {
    BookingNotFoundError,
    ConflictBlockedError,
    InvalidFieldValueError,
    InvalidTransitionError,
    ReadOnlyBookingError,
} from '../../domain/errors/booking.errors';
import { InMemoryBookingStore } from '../../infrastructure/persistence/in-memory-booking.store';
import { BookingTestContext, createBookingTestContext, makeBooking, NOW } from '../../testing/booking.fixtures';

const july = (day: number, hour = 12) => new Date(Date.UTC(2025, 6, day, hour));

describe('StatusStateMachineService', () => {
    let store: InMemoryBookingStore;
    let ctx: BookingTestContext;

    beforeEach(async () => {
        store = new InMemoryBookingStore();
        ctx = await createBookingTestContext(store);
    });

    afterEach(async () => {
        await ctx.module.close();
    });

    describe('requestTransition', () => {
        it('confirms the first of two clashing requests and blocks the second', async () => {
            await store.create(makeBooking({ id: 'A', externalKey: 'a', arriving: july(10), departing: july(12) }));
            await store.create(makeBooking({ id: 'B', externalKey: 'b', arriving: july(11), departing: july(13) }));

            const tracking = await ctx.stateMachine.requestTransition('A', 'Confirmed', { actor: 'warden' });
            expect(tracking.status).toBe('Confirmed');
            expect(tracking.notes.map(note => note.text)).toEqual(['Status changed [New] > [Confirmed]']);

            const attempt = ctx.stateMachine.requestTransition('B', 'Confirmed', { actor: 'warden' });
            await expect(attempt).rejects.toBeInstanceOf(ConflictBlockedError);
            await expect(attempt).rejects.toMatchObject({
                code: 'ConflictBlocked',
                bookingId: 'B',
                reason: 'Clashes with A',
            });

            const b = await store.get('B');
            expect(b?.status.value).toBe('New');
            expect(b?.tracking.notes).toEqual([]);

            await ctx.stateMachine.requestTransition('A', 'Cancelled', { reason: 'Group disbanded', actor: 'warden' });
            await expect(ctx.stateMachine.requestTransition('B', 'Confirmed', { actor: 'warden' }))
                .resolves.toMatchObject({ status: 'Confirmed' });
        });

        it('lets exactly one of two concurrent clashing confirmations through', async () => {
            await store.create(makeBooking({ id: 'A', externalKey: 'a', arriving: july(10), departing: july(12) }));
            await store.create(makeBooking({ id: 'B', externalKey: 'b', arriving: july(11), departing: july(13) }));

            const results = await Promise.allSettled([
                ctx.stateMachine.requestTransition('A', 'Confirmed'),
                ctx.stateMachine.requestTransition('B', 'Confirmed'),
            ]);

            expect(results.filter(result => result.status === 'fulfilled')).toHaveLength(1);
            const rejected = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
            expect(rejected).toHaveLength(1);
            expect(rejected[0].reason).toBeInstanceOf(ConflictBlockedError);

            const confirmed = await store.listActive({ statuses: ['Confirmed'] });
            expect(confirmed).toHaveLength(1);
        });

        it('confirms when the only overlapping booking uses another facility', async () => {
            await store.create(makeBooking({ id: 'A', externalKey: 'a', facilities: ['Field A'] }, { status: 'Confirmed' }));
            await store.create(makeBooking({ id: 'B', externalKey: 'b', facilities: ['Hall'] }));

            await expect(ctx.stateMachine.requestTransition('B', 'Confirmed')).resolves.toMatchObject({ status: 'Confirmed' });
        });

        it('fails with NotFound for an unknown id', async () => {
            await expect(ctx.stateMachine.requestTransition('missing', 'Confirmed'))
                .rejects.toBeInstanceOf(BookingNotFoundError);
        });

        it('fails with InvalidTransition outside the table and leaves the booking alone', async () => {
            await store.create(makeBooking({ id: 'A' }));

            await expect(ctx.stateMachine.requestTransition('A', 'Invoice')).rejects.toMatchObject({
                code: 'InvalidTransition',
                from: 'New',
                to: 'Invoice',
                reason: 'Cannot move from New to Invoice (allowed: Pending, Confirmed, Cancelled)',
            });
            expect((await store.get('A'))?.status.value).toBe('New');
        });

        it('requires a reason to cancel and stores it', async () => {
            await store.create(makeBooking({ id: 'A' }, { status: 'Confirmed' }));

            await expect(ctx.stateMachine.requestTransition('A', 'Cancelled')).rejects.toBeInstanceOf(InvalidTransitionError);

            const tracking = await ctx.stateMachine.requestTransition('A', 'Cancelled', { reason: '  Weather  ', actor: 'warden' });
            expect(tracking.cancelReason).toBe('Weather');
            expect(tracking.notes.map(note => note.text)).toEqual([
                'Status changed [Confirmed] > [Cancelled] - Cancel reason: Weather',
            ]);
        });

        it('reinstates a cancelled booking only while its arrival is ahead', async () => {
            await store.create(makeBooking({ id: 'future', externalKey: 'f' }, { status: 'Cancelled', cancelReason: 'Weather' }));
            await store.create(makeBooking({
                id: 'past',
                externalKey: 'p',
                arriving: new Date('2025-05-01T14:00:00Z'),
                departing: new Date('2025-05-03T11:00:00Z'),
            }, { status: 'Cancelled', cancelReason: 'Weather' }));

            const tracking = await ctx.stateMachine.requestTransition('future', 'New');
            expect(tracking.status).toBe('New');
            expect(tracking.cancelReason).toBeUndefined();

            await expect(ctx.stateMachine.requestTransition('past', 'New')).rejects.toMatchObject({
                code: 'InvalidTransition',
                reason: 'Cannot reinstate a booking whose arrival date has passed',
            });
        });

        it('treats archived bookings as not found', async () => {
            await store.create(makeBooking({ id: 'A' }, { status: 'Completed' }));
            await store.moveToArchive('A');

            await expect(ctx.stateMachine.requestTransition('A', 'Cancelled', { reason: 'Late' }))
                .rejects.toBeInstanceOf(BookingNotFoundError);
        });

        it('publishes the lifecycle event after the change is stored', async () => {
            await store.create(makeBooking({ id: 'A' }));
            const listener = jest.fn();
            ctx.events.on(BOOKING_STATUS_CHANGED, listener);

            await ctx.stateMachine.requestTransition('A', 'Pending', { reason: 'Which field?', actor: 'warden' });

            expect(listener).toHaveBeenCalledWith({
                bookingId: 'A',
                from: 'New',
                to: 'Pending',
                timestamp: NOW,
                reason: 'Which field?',
                actor: 'warden',
                leaderEmail: 'leader@example.com',
            });
        });

        it('keeps the transition when a listener fails', async () => {
            await store.create(makeBooking({ id: 'A' }));
            ctx.events.on(BOOKING_STATUS_CHANGED, () => {
                throw new Error('mail relay down');
            });

            await expect(ctx.stateMachine.requestTransition('A', 'Confirmed')).resolves.toMatchObject({ status: 'Confirmed' });
            expect((await store.get('A'))?.status.value).toBe('Confirmed');
            expect(ctx.logger.logError).toHaveBeenCalledWith(
                expect.objectContaining({ message: 'mail relay down' }),
                { bookingId: 'A', operation: 'publishEvents' },
            );
        });
    });

    describe('updateBookingFields', () => {
        it('applies an edit and stores one note per changed field', async () => {
            await store.create(makeBooking({ id: 'A' }));

            const result = await ctx.stateMachine.updateBookingFields('A', { groupSize: 14, leaderName: 'Sam Leader' }, 'warden');

            expect(result.changed).toEqual(['groupSize']);
            const stored = await store.get('A');
            expect(stored?.groupSize).toBe(14);
            expect(stored?.tracking.notes).toEqual([{ at: NOW, actor: 'warden', text: 'groupSize changed from [12] to [14]' }]);
        });

        it('rejects fields outside the allow-list before touching the store', async () => {
            const get = jest.spyOn(store, 'get');

            await expect(ctx.stateMachine.updateBookingFields('A', { status: 'Confirmed' }))
                .rejects.toBeInstanceOf(InvalidFieldValueError);
            await expect(ctx.stateMachine.updateBookingFields('A', { groupSize: 0 }))
                .rejects.toBeInstanceOf(InvalidFieldValueError);
            await expect(ctx.stateMachine.updateBookingFields('A', {}))
                .rejects.toMatchObject({ problems: ['at least one field is required'] });
            expect(get).not.toHaveBeenCalled();
        });

        it('only accepts group types declared in the field mappings', async () => {
            await store.create(makeBooking({ id: 'A' }));

            await expect(ctx.stateMachine.updateBookingFields('A', { groupType: 'county' }))
                .rejects.toMatchObject({ code: 'InvalidFieldValue', problems: ['groupType: unknown group type county'] });

            const result = await ctx.stateMachine.updateBookingFields('A', { groupType: 'External group' }, 'warden');
            expect(result.changed).toEqual(['groupType']);
            const stored = await store.get('A');
            expect(stored?.groupType).toBe('external');
            expect(stored?.tracking.notes.map(note => note.text)).toEqual(['groupType changed from [district] to [external]']);
        });

        it('is read-only outside New, Pending and Confirmed', async () => {
            await store.create(makeBooking({ id: 'A' }, { status: 'Invoice' }));

            await expect(ctx.stateMachine.updateBookingFields('A', { groupName: 'Renamed' }))
                .rejects.toBeInstanceOf(ReadOnlyBookingError);
        });

        it('blocks moving a confirmed booking onto another confirmed stay', async () => {
            await store.create(makeBooking({ id: 'A', externalKey: 'a', facilities: ['Hall'] }, { status: 'Confirmed' }));
            await store.create(makeBooking({ id: 'B', externalKey: 'b', facilities: ['Field A'] }, { status: 'Confirmed' }));

            await expect(ctx.stateMachine.updateBookingFields('B', { facilities: ['Hall'] }))
                .rejects.toMatchObject({ code: 'ConflictBlocked', reason: 'Clashes with A' });
            expect((await store.get('B'))?.facilities.values).toEqual(['Field A']);
        });

        it('lets an unconfirmed booking move onto a busy facility', async () => {
            await store.create(makeBooking({ id: 'A', externalKey: 'a', facilities: ['Hall'] }, { status: 'Confirmed' }));
            await store.create(makeBooking({ id: 'B', externalKey: 'b', facilities: ['Field A'] }));

            const result = await ctx.stateMachine.updateBookingFields('B', { facilities: ['Hall'] });
            expect(result.changed).toEqual(['facilities']);
        });
    });

    describe('advanceDeparted', () => {
        it('moves departed confirmed bookings to Invoice with an automatic note', async () => {
            await store.create(makeBooking({
                id: 'gone',
                externalKey: 'g',
                arriving: new Date('2025-05-20T14:00:00Z'),
                departing: new Date('2025-05-22T11:00:00Z'),
            }, { status: 'Confirmed' }));
            await store.create(makeBooking({ id: 'upcoming', externalKey: 'u' }, { status: 'Confirmed' }));

            const advanced = await ctx.stateMachine.advanceDeparted(NOW);

            expect(advanced).toEqual(['gone']);
            const gone = await store.get('gone');
            expect(gone?.status.value).toBe('Invoice');
            expect(gone?.tracking.notes).toEqual([{ at: NOW, actor: 'system', text: 'Auto status change [Confirmed] > [Invoice]' }]);
            expect((await store.get('upcoming'))?.status.value).toBe('Confirmed');
        });
    });
});
