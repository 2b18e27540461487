import { DomainEvent } from '../../../../shared/domain/base/domain-event.base';
import type { BookingStatusValue } from '../value-objects/booking-status.vo';

export const BOOKING_STATUS_CHANGED = 'booking.status.changed';

export interface BookingLifecycleEvent {
    bookingId: string;
    from: BookingStatusValue;
    to: BookingStatusValue;
    timestamp: Date;
    reason?: string;
    actor: string;
    leaderEmail: string;
}

export class BookingStatusChangedEvent extends DomainEvent {
    constructor(
        public readonly bookingId: string,
        public readonly from: BookingStatusValue,
        public readonly to: BookingStatusValue,
        public readonly actor: string,
        public readonly leaderEmail: string,
        public readonly reason: string | undefined,
        occurredOn: Date,
    ) {
        super(BOOKING_STATUS_CHANGED, occurredOn);
    }

    toPayload(): Record<string, unknown> {
        const payload: BookingLifecycleEvent = {
            bookingId: this.bookingId,
            from: this.from,
            to: this.to,
            timestamp: this.occurredOn,
            reason: this.reason,
            actor: this.actor,
            leaderEmail: this.leaderEmail,
        };
        return { ...payload };
    }
}
