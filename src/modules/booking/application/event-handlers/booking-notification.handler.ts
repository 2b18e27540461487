import { Inject, Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { CustomLoggerService } from '../../../../common/services/logger.service';
import { BOOKING_STATUS_CHANGED } from '../../domain/events/booking-status-changed.event';
import type { BookingLifecycleEvent } from '../../domain/events/booking-status-changed.event';
import { NOTIFICATION_GATEWAY } from '../../domain/gateways/notification-gateway.interface';
import type { INotificationGateway } from '../../domain/gateways/notification-gateway.interface';

/**
 * Forwards status changes to the notification gateway once they are committed.
 * A failed delivery is logged; the transition stands.
 */
@Injectable()
export class BookingNotificationHandler {
    constructor(
        @Inject(NOTIFICATION_GATEWAY) private readonly gateway: INotificationGateway,
        private readonly logger: CustomLoggerService,
    ) { }

    @OnEvent(BOOKING_STATUS_CHANGED, { async: true })
    async handle(event: BookingLifecycleEvent): Promise<void> {
        try {
            await this.gateway.notify(event);
        } catch (error) {
            this.logger.error(
                `Failed to notify booker about ${event.from} > ${event.to}`,
                error instanceof Error ? error.stack : String(error),
                { bookingId: event.bookingId, operation: 'notify' },
            );
        }
    }
}
