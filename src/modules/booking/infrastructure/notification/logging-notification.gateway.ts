import { Injectable } from '@nestjs/common';
import { CustomLoggerService } from '../../../../common/services/logger.service';
import { BookingLifecycleEvent } from '../../domain/events/booking-status-changed.event';
import { INotificationGateway } from '../../domain/gateways/notification-gateway.interface';

/**
 * Default gateway: records the notification that would go to the group leader.
 */
@Injectable()
export class LoggingNotificationGateway implements INotificationGateway {
    constructor(private readonly logger: CustomLoggerService) { }

    async notify(event: BookingLifecycleEvent): Promise<void> {
        this.logger.logBusinessEvent('booking_notification_sent', {
            bookingId: event.bookingId,
            recipient: event.leaderEmail,
            subject: `Booking ${event.bookingId} is now ${event.to}`,
            from: event.from,
            to: event.to,
            reason: event.reason,
        });
    }
}
