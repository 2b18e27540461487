import { BOOKING_FIELDS } from '../aggregates/booking.aggregate';
import type { BookingField } from '../aggregates/booking.aggregate';
import type { BookingStatusValue } from '../value-objects/booking-status.vo';

/**
 * Domain Policy: Editable Fields
 * Allow-list of booking fields a person may edit, keyed by current status.
 */
export class EditableFieldsPolicy {
    static readonly EDITABLE_BY_STATUS: Readonly<Record<BookingStatusValue, readonly BookingField[]>> = {
        New: BOOKING_FIELDS,
        Pending: BOOKING_FIELDS,
        Confirmed: BOOKING_FIELDS,
        Cancelled: [],
        Invoice: [],
        Completed: [],
    };

    /** Fields that move the booking on the facility calendar. */
    static readonly SCHEDULE_FIELDS: readonly BookingField[] = ['arriving', 'departing', 'facilities'];

    static editableFields(status: BookingStatusValue): readonly BookingField[] {
        return this.EDITABLE_BY_STATUS[status];
    }

    static disallowedFields(status: BookingStatusValue, fields: readonly BookingField[]): BookingField[] {
        const allowed = this.EDITABLE_BY_STATUS[status];
        return fields.filter(field => !allowed.includes(field));
    }

    static touchesSchedule(fields: readonly BookingField[]): boolean {
        return fields.some(field => this.SCHEDULE_FIELDS.includes(field));
    }
}
