import { BookingStatus, BookingStatusValue } from '../value-objects/booking-status.vo';

export type TransitionDecision =
    | { allowed: true }
    | { allowed: false; reason: string };

/**
 * Domain Policy: Status Transition
 * Pure validity check against the transition table; no clash lookup and no side effects.
 */
export class StatusTransitionPolicy {
    private static readonly REASON_REQUIRED: readonly BookingStatusValue[] = ['Pending', 'Cancelled'];

    static evaluate(params: {
        from: BookingStatus;
        to: BookingStatusValue;
        reason?: string;
        arriving: Date;
        now: Date;
    }): TransitionDecision {
        const { from, to, reason, arriving, now } = params;

        if (!from.canTransitionTo(to)) {
            const allowed = from.allowedTargets.length > 0 ? from.allowedTargets.join(', ') : 'none';
            return {
                allowed: false,
                reason: `Cannot move from ${from.value} to ${to} (allowed: ${allowed})`,
            };
        }

        if (this.requiresReason(to) && !reason?.trim()) {
            return {
                allowed: false,
                reason: to === 'Cancelled'
                    ? 'Cancellation reason is required'
                    : 'A question for the booker is required to pend a booking',
            };
        }

        // Past bookings stay cancelled.
        if (from.isCancelled && to === 'New' && arriving.getTime() <= now.getTime()) {
            return {
                allowed: false,
                reason: 'Cannot reinstate a booking whose arrival date has passed',
            };
        }

        return { allowed: true };
    }

    static requiresReason(to: BookingStatusValue): boolean {
        return this.REASON_REQUIRED.includes(to);
    }

    /** Confirmation is the only transition gated on facility clashes. */
    static requiresClashCheck(to: BookingStatusValue): boolean {
        return to === 'Confirmed';
    }
}
