import type { BookingLifecycleEvent } from '../events/booking-status-changed.event';

export const NOTIFICATION_GATEWAY = Symbol('NOTIFICATION_GATEWAY');

/** Best-effort delivery of lifecycle events; the core never waits on the result. */
export interface INotificationGateway {
    notify(event: BookingLifecycleEvent): Promise<void>;
}
