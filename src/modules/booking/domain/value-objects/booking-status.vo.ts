import { ValueObject } from '../../../../shared/domain/base/value-object.base';

/** Listing order: active work first, cancelled last. */
export const BOOKING_STATUSES = ['New', 'Pending', 'Confirmed', 'Invoice', 'Completed', 'Cancelled'] as const;

export type BookingStatusValue = (typeof BOOKING_STATUSES)[number];

export const STATUS_TRANSITIONS: Readonly<Record<BookingStatusValue, readonly BookingStatusValue[]>> = {
    New: ['Pending', 'Confirmed', 'Cancelled'],
    Pending: ['Confirmed', 'Cancelled'],
    Confirmed: ['Cancelled', 'Invoice'],
    Cancelled: ['New'],
    Invoice: ['Completed'],
    Completed: [],
};

const EDITABLE: readonly BookingStatusValue[] = ['New', 'Pending', 'Confirmed'];
const ARCHIVABLE: readonly BookingStatusValue[] = ['Cancelled', 'Completed'];
export const OCCUPYING_STATUSES: readonly BookingStatusValue[] = ['Confirmed', 'Invoice', 'Completed'];

interface BookingStatusProps {
    readonly value: BookingStatusValue;
}

export class BookingStatus extends ValueObject<BookingStatusProps> {
    private constructor(props: BookingStatusProps) {
        super(props);
    }

    get value(): BookingStatusValue {
        return this.props.value;
    }

    get isEditable(): boolean {
        return EDITABLE.includes(this.props.value);
    }

    /** Cancelled and Completed bookings may be swept into the archive. */
    get isArchivable(): boolean {
        return ARCHIVABLE.includes(this.props.value);
    }

    /** Statuses that hold the facility and block a clashing confirmation. */
    get isOccupying(): boolean {
        return OCCUPYING_STATUSES.includes(this.props.value);
    }

    get isCancelled(): boolean {
        return this.props.value === 'Cancelled';
    }

    get allowedTargets(): readonly BookingStatusValue[] {
        return STATUS_TRANSITIONS[this.props.value];
    }

    get sortIndex(): number {
        return BOOKING_STATUSES.indexOf(this.props.value);
    }

    canTransitionTo(target: BookingStatusValue): boolean {
        return STATUS_TRANSITIONS[this.props.value].includes(target);
    }

    static initial(): BookingStatus {
        return new BookingStatus({ value: 'New' });
    }

    static of(value: BookingStatusValue): BookingStatus {
        return new BookingStatus({ value });
    }

    static isValue(value: string): value is BookingStatusValue {
        return BOOKING_STATUSES.some(status => status === value);
    }

    static fromString(value: string): BookingStatus {
        if (!BookingStatus.isValue(value)) {
            throw new Error(`Invalid booking status: ${value}`);
        }
        return new BookingStatus({ value });
    }

    protected equalsCore(other: BookingStatus): boolean {
        return this.props.value === other.props.value;
    }
}
