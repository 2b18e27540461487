import { Inject, Injectable } from '@nestjs/common';
import { CustomLoggerService } from '../../../../common/services/logger.service';
import { ArchivalPolicy } from '../../domain/policies/archival.policy';
import { BOOKING_STORE } from '../../domain/repositories/booking-store.interface';
import type { IBookingStore } from '../../domain/repositories/booking-store.interface';
import { BookingLockService } from './booking-lock.service';

@Injectable()
export class ArchivalSweeperService {
    constructor(
        @Inject(BOOKING_STORE)
        private readonly bookingStore: IBookingStore,
        private readonly locks: BookingLockService,
        private readonly logger: CustomLoggerService,
    ) { }

    /**
     * Moves Cancelled and Completed bookings that departed before
     * `now - retentionMs` into the archive and returns how many moved.
     * Each candidate is re-read under its booking lock first.
     */
    sweep(now: Date, retentionMs: number): Promise<number> {
        return this.locks.withPass('sweep', async () => {
            const cutoff = ArchivalPolicy.cutoff(now, retentionMs);
            const candidates = await this.bookingStore.listActive({
                statuses: ['Cancelled', 'Completed'],
                departingBefore: cutoff,
            });

            let archived = 0;
            for (const candidate of candidates) {
                const moved = await this.locks.withBooking(candidate.id, async () => {
                    const current = await this.bookingStore.get(candidate.id);
                    if (!current || !ArchivalPolicy.isArchivable(current, now, retentionMs)) {
                        return false;
                    }
                    await this.bookingStore.moveToArchive(current.id);
                    return true;
                });

                if (moved) {
                    archived += 1;
                    this.logger.logBusinessEvent('booking_archived', {
                        bookingId: candidate.id,
                        status: candidate.status.value,
                        departing: candidate.departing.toISOString(),
                    });
                }
            }

            this.logger.logBusinessEvent('archive_sweep_completed', {
                archived,
                cutoff: cutoff.toISOString(),
            });
            return archived;
        });
    }
}
