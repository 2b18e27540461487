import { Inject, Injectable } from '@nestjs/common';
import { CustomLoggerService } from '../../../../common/services/logger.service';
import { validateInput } from '../../../../common/validation/validate-input';
import { DomainEventPublisher } from '../../../../shared/infrastructure/domain-event-publisher';
import { Booking, BookingField, TrackingRecord } from '../../domain/aggregates/booking.aggregate';
import {
    BookingNotFoundError,
    ConflictBlockedError,
    InvalidFieldValueError,
    InvalidTransitionError,
    ReadOnlyBookingError,
    StoreUnavailableError,
} from '../../domain/errors/booking.errors';
import { BOOKING_CLOCK } from '../../domain/gateways/clock.interface';
import type { Clock } from '../../domain/gateways/clock.interface';
import { EditableFieldsPolicy } from '../../domain/policies/editable-fields.policy';
import { StatusTransitionPolicy } from '../../domain/policies/status-transition.policy';
import { BOOKING_STORE } from '../../domain/repositories/booking-store.interface';
import type { IBookingStore } from '../../domain/repositories/booking-store.interface';
import { BookingStatusValue, OCCUPYING_STATUSES } from '../../domain/value-objects/booking-status.vo';
import { FacilitySet } from '../../domain/value-objects/facility-set.vo';
import { RawRowMapper } from '../../infrastructure/source/raw-row.mapper';
import { UpdateBookingFieldsDto } from '../dto/update-booking-fields.dto';
import { BookingLockService } from './booking-lock.service';
import { ConflictDetectorService } from './conflict-detector.service';

export interface TransitionRequest {
    reason?: string;
    actor?: string;
}

export interface FieldUpdateResult {
    bookingId: string;
    changed: BookingField[];
    tracking: TrackingRecord;
}

interface TransitionOptions {
    actor: string;
    at: Date;
    reason?: string;
    note?: string;
    /** Skip quietly unless the booking is still in this status. */
    expectedStatus?: BookingStatusValue;
}

const SYSTEM_ACTOR = 'system';

/**
 * The only writer of status changes on existing bookings. Every change runs
 * under the per-booking lock; confirmation additionally holds the facility
 * locks across its clash check and write.
 */
@Injectable()
export class StatusStateMachineService {
    constructor(
        @Inject(BOOKING_STORE)
        private readonly bookingStore: IBookingStore,
        @Inject(BOOKING_CLOCK)
        private readonly clock: Clock,
        private readonly conflictDetector: ConflictDetectorService,
        private readonly locks: BookingLockService,
        private readonly rowMapper: RawRowMapper,
        private readonly eventPublisher: DomainEventPublisher,
        private readonly logger: CustomLoggerService,
    ) { }

    async requestTransition(
        bookingId: string,
        target: BookingStatusValue,
        request: TransitionRequest = {},
    ): Promise<TrackingRecord> {
        const booking = await this.transition(bookingId, target, {
            actor: request.actor ?? SYSTEM_ACTOR,
            at: this.clock.now(),
            reason: request.reason?.trim() || undefined,
        });
        if (!booking) {
            throw new BookingNotFoundError(bookingId);
        }
        return booking.tracking;
    }

    /**
     * Validates an edit against the field allow-list before taking the lock,
     * then applies it. Schedule changes on a confirmed booking are clash-checked
     * under the locks of every facility involved.
     */
    async updateBookingFields(bookingId: string, input: unknown, actor: string = SYSTEM_ACTOR): Promise<FieldUpdateResult> {
        const validation = await validateInput(UpdateBookingFieldsDto, input);
        if (!validation.valid) {
            throw new InvalidFieldValueError(validation.problems, bookingId);
        }
        const dto = validation.value;
        const fields = dto.providedFields();
        if (fields.length === 0) {
            throw new InvalidFieldValueError(['at least one field is required'], bookingId);
        }
        const values = dto.toFieldValues();
        if (values.groupType !== undefined) {
            const groupType = this.rowMapper.groupTypeKey(values.groupType);
            if (!groupType) {
                throw new InvalidFieldValueError([`groupType: unknown group type ${values.groupType}`], bookingId);
            }
            values.groupType = groupType;
        }

        return this.locks.withBooking(bookingId, async () => {
            const booking = await this.loadActive(bookingId);

            if (EditableFieldsPolicy.disallowedFields(booking.status.value, fields).length > 0) {
                throw new ReadOnlyBookingError(bookingId, booking.status.value);
            }

            const apply = async (): Promise<BookingField[]> => {
                const changed = booking.applyFieldChanges(values, { actor, at: this.clock.now() });
                if (changed.length === 0) return changed;

                if (booking.status.isOccupying && EditableFieldsPolicy.touchesSchedule(changed)) {
                    const clashes = await this.conflictDetector.findClashesFor(booking, OCCUPYING_STATUSES);
                    if (clashes.length > 0) {
                        throw new ConflictBlockedError(bookingId, clashes.map(ConflictDetectorService.toSummary));
                    }
                }

                await this.bookingStore.updateBookingFields(booking);
                return changed;
            };

            const changed = booking.status.isOccupying && EditableFieldsPolicy.touchesSchedule(fields)
                ? await this.locks.withFacilities(
                    booking.facilities.union(FacilitySet.create(values.facilities ?? [])).values,
                    apply,
                )
                : await apply();

            if (changed.length > 0) {
                this.logger.logBusinessEvent('booking_fields_updated', { bookingId, actor, changed });
            }

            return { bookingId, changed, tracking: booking.tracking };
        });
    }

    /**
     * Moves every Confirmed booking whose departure has passed to Invoice.
     * Returns the ids advanced.
     */
    async advanceDeparted(now: Date = this.clock.now()): Promise<string[]> {
        const departed = await this.bookingStore.listActive({ statuses: ['Confirmed'], departingBefore: now });
        const advanced: string[] = [];

        for (const candidate of departed) {
            try {
                const booking = await this.transition(candidate.id, 'Invoice', {
                    actor: SYSTEM_ACTOR,
                    at: now,
                    note: 'Auto status change [Confirmed] > [Invoice]',
                    expectedStatus: 'Confirmed',
                });
                if (booking) advanced.push(booking.id);
            } catch (error) {
                if (error instanceof StoreUnavailableError) throw error;
                this.logger.warn(`Auto-advance skipped booking ${candidate.id}`, {
                    bookingId: candidate.id,
                    operation: 'advanceDeparted',
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        }

        if (advanced.length > 0) {
            this.logger.logBusinessEvent('bookings_auto_advanced', { count: advanced.length, bookingIds: advanced });
        }
        return advanced;
    }

    /**
     * Returns null only when `expectedStatus` no longer holds.
     */
    private async transition(bookingId: string, target: BookingStatusValue, options: TransitionOptions): Promise<Booking | null> {
        const booking = await this.locks.withBooking(bookingId, async () => {
            const current = await this.loadActive(bookingId);
            if (options.expectedStatus && current.status.value !== options.expectedStatus) {
                return null;
            }

            const from = current.status.value;
            const decision = StatusTransitionPolicy.evaluate({
                from: current.status,
                to: target,
                reason: options.reason,
                arriving: current.arriving,
                now: options.at,
            });
            if (!decision.allowed) {
                throw new InvalidTransitionError(bookingId, from, target, decision.reason);
            }

            const commit = async (): Promise<void> => {
                current.transitionTo(target, {
                    actor: options.actor,
                    at: options.at,
                    reason: options.reason,
                    note: options.note,
                });
                await this.bookingStore.updateTracking(current);
            };

            if (StatusTransitionPolicy.requiresClashCheck(target)) {
                await this.locks.withFacilities(current.facilities.values, async () => {
                    const clashes = await this.conflictDetector.findClashesFor(current, OCCUPYING_STATUSES);
                    if (clashes.length > 0) {
                        throw new ConflictBlockedError(bookingId, clashes.map(ConflictDetectorService.toSummary));
                    }
                    await commit();
                });
            } else {
                await commit();
            }

            this.logger.logBusinessEvent('booking_status_changed', {
                bookingId,
                from,
                to: target,
                actor: options.actor,
            });
            return current;
        });

        if (booking) {
            this.publishEvents(booking);
        }
        return booking;
    }

    private async loadActive(bookingId: string): Promise<Booking> {
        const booking = await this.bookingStore.get(bookingId);
        if (!booking) {
            throw new BookingNotFoundError(bookingId);
        }
        return booking;
    }

    private publishEvents(booking: Booking): void {
        try {
            this.eventPublisher.publishEventsFromAggregate(booking);
        } catch (error) {
            this.logger.logError(error instanceof Error ? error : new Error(String(error)), {
                bookingId: booking.id,
                operation: 'publishEvents',
            });
        }
    }
}
