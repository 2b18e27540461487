import { Inject, Injectable } from '@nestjs/common';
import { CustomLoggerService } from '../../../../common/services/logger.service';
import { Booking } from '../../domain/aggregates/booking.aggregate';
import { StoreConflictError } from '../../domain/errors/booking-store.errors';
import { MalformedRowError } from '../../domain/errors/booking.errors';
import { BOOKING_CLOCK } from '../../domain/gateways/clock.interface';
import type { Clock } from '../../domain/gateways/clock.interface';
import { RawRowBatch, RawSourceRow } from '../../domain/gateways/raw-row-source.interface';
import { BOOKING_STORE } from '../../domain/repositories/booking-store.interface';
import type { IBookingStore } from '../../domain/repositories/booking-store.interface';
import { RawRowMapper } from '../../infrastructure/source/raw-row.mapper';
import { BookingLockService } from './booking-lock.service';

export interface PullSummary {
    /** Ids of the bookings created by this pass. */
    created: string[];
    /** External keys already tracked, active or archived. */
    skipped: string[];
    errored: { rowIndex: number; reason: string }[];
}

/**
 * Merges raw source rows into the tracked booking set. Existing bookings are
 * never touched: a row whose external key is known is skipped.
 */
@Injectable()
export class ReconciliationEngineService {
    constructor(
        @Inject(BOOKING_STORE)
        private readonly bookingStore: IBookingStore,
        @Inject(BOOKING_CLOCK)
        private readonly clock: Clock,
        private readonly rowMapper: RawRowMapper,
        private readonly locks: BookingLockService,
        private readonly logger: CustomLoggerService,
    ) { }

    pull(rows: readonly RawSourceRow[], groupType?: string): Promise<PullSummary> {
        return this.pullBatches([{ groupType, rows: [...rows] }]);
    }

    /**
     * Row indexes run across all batches in order. A pass is not atomic: a
     * store outage aborts it, but bookings created before the outage stay
     * in the store. A retry skips them, so repeated passes converge.
     */
    pullBatches(batches: readonly RawRowBatch[]): Promise<PullSummary> {
        return this.locks.withPass('reconciliation', async () => {
            const startedAt = Date.now();
            const summary: PullSummary = { created: [], skipped: [], errored: [] };
            let rowIndex = 0;

            for (const batch of batches) {
                for (const row of batch.rows) {
                    await this.reconcileRow(row, rowIndex, batch.groupType, summary);
                    rowIndex += 1;
                }
            }

            this.logger.logBusinessEvent('bookings_pulled', {
                created: summary.created.length,
                skipped: summary.skipped.length,
                errored: summary.errored.length,
            });
            this.logger.logPerformance('reconciliation.pull', Date.now() - startedAt, { operation: 'pull' });
            return summary;
        });
    }

    private async reconcileRow(
        row: RawSourceRow,
        rowIndex: number,
        groupType: string | undefined,
        summary: PullSummary,
    ): Promise<void> {
        let booking: Booking;
        try {
            const mapped = this.rowMapper.map(row, rowIndex, groupType);
            const existing = await this.bookingStore.getByExternalKey(mapped.externalKey);
            if (existing) {
                summary.skipped.push(mapped.externalKey);
                return;
            }
            booking = Booking.import({ ...mapped, importedAt: this.clock.now() });
        } catch (error) {
            if (error instanceof MalformedRowError) {
                summary.errored.push({ rowIndex, reason: error.detail });
                this.logger.warn(`Skipping malformed row ${rowIndex}: ${error.detail}`, { operation: 'pull' });
                return;
            }
            throw error;
        }

        try {
            await this.bookingStore.create(booking);
            summary.created.push(booking.id);
            this.logger.logBusinessEvent('booking_imported', {
                bookingId: booking.id,
                groupName: booking.groupName,
                arriving: booking.arriving.toISOString(),
            });
        } catch (error) {
            if (!(error instanceof StoreConflictError)) throw error;
            // Lost a create race, or an id collision with a different submission.
            if (await this.bookingStore.getByExternalKey(booking.externalKey)) {
                summary.skipped.push(booking.externalKey);
                return;
            }
            summary.errored.push({ rowIndex, reason: `booking id ${booking.id} is already taken` });
            this.logger.warn(`Booking id collision for row ${rowIndex}`, { bookingId: booking.id, operation: 'pull' });
        }
    }
}
