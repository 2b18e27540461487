import { AggregateRoot } from '../../../../shared/domain/base/aggregate-root.base';
import { BookingStatus, BookingStatusValue, FacilitySet, StayInterval } from '../value-objects/index';
import { BookingStatusChangedEvent } from '../events/booking-status-changed.event';
import { InvalidFieldValueError, ReadOnlyBookingError } from '../errors/booking.errors';

export interface BookingNote {
    at: Date;
    actor: string;
    text: string;
}

export interface TrackingRecord {
    status: BookingStatusValue;
    pendQuestion?: string;
    cancelReason?: string;
    bookersComment?: string;
    notes: BookingNote[];
}

export interface BookingDetails {
    groupName: string;
    leaderName: string;
    leaderPhone: string;
    leaderEmail: string;
    groupType: string;
    groupSize: number;
    costEstimate: number;
    arriving: Date;
    departing: Date;
    facilities: string[];
}

export type BookingFieldValues = Partial<BookingDetails> & { bookersComment?: string };

export type BookingField = keyof BookingFieldValues;

export const BOOKING_FIELDS: readonly BookingField[] = [
    'groupName',
    'leaderName',
    'leaderPhone',
    'leaderEmail',
    'groupType',
    'groupSize',
    'costEstimate',
    'arriving',
    'departing',
    'facilities',
    'bookersComment',
];

export interface BookingSnapshot extends BookingDetails {
    id: string;
    externalKey: string;
    submitted?: Date;
    originalSourceData: Record<string, string>;
    tracking: TrackingRecord;
    createdAt: Date;
    updatedAt: Date;
}

export interface BookingProps {
    externalKey: string;
    groupName: string;
    leaderName: string;
    leaderPhone: string;
    leaderEmail: string;
    groupType: string;
    groupSize: number;
    costEstimate: number;
    stay: StayInterval;
    facilities: FacilitySet;
    submitted?: Date;
    originalSourceData: Readonly<Record<string, string>>;
    status: BookingStatus;
    pendQuestion?: string;
    cancelReason?: string;
    bookersComment?: string;
    notes: BookingNote[];
    createdAt: Date;
    updatedAt: Date;
}

export interface TransitionContext {
    actor: string;
    at: Date;
    reason?: string;
    /** Replaces the default "Status changed" note text. */
    note?: string;
}

const REASON_LABELS: Partial<Record<BookingStatusValue, string>> = {
    Pending: 'Pend question',
    Cancelled: 'Cancel reason',
};

export class Booking extends AggregateRoot<BookingProps> {
    private constructor(id: string, props: BookingProps) {
        super(id, props);
    }

    // Getters
    get externalKey(): string { return this.props.externalKey; }
    get groupName(): string { return this.props.groupName; }
    get leaderName(): string { return this.props.leaderName; }
    get leaderPhone(): string { return this.props.leaderPhone; }
    get leaderEmail(): string { return this.props.leaderEmail; }
    get groupType(): string { return this.props.groupType; }
    get groupSize(): number { return this.props.groupSize; }
    get costEstimate(): number { return this.props.costEstimate; }
    get stay(): StayInterval { return this.props.stay; }
    get facilities(): FacilitySet { return this.props.facilities; }
    get submitted(): Date | undefined { return this.props.submitted; }
    get originalSourceData(): Readonly<Record<string, string>> { return this.props.originalSourceData; }
    get status(): BookingStatus { return this.props.status; }
    get createdAt(): Date { return this.props.createdAt; }
    get updatedAt(): Date { return this.props.updatedAt; }

    // Derived getters
    get arriving(): Date { return this.props.stay.arriving; }
    get departing(): Date { return this.props.stay.departing; }
    get isEditable(): boolean { return this.props.status.isEditable; }

    get tracking(): TrackingRecord {
        return {
            status: this.props.status.value,
            pendQuestion: this.props.pendQuestion,
            cancelReason: this.props.cancelReason,
            bookersComment: this.props.bookersComment,
            notes: this.props.notes.map(note => ({ ...note, at: new Date(note.at) })),
        };
    }

    get details(): BookingDetails {
        return {
            groupName: this.props.groupName,
            leaderName: this.props.leaderName,
            leaderPhone: this.props.leaderPhone,
            leaderEmail: this.props.leaderEmail,
            groupType: this.props.groupType,
            groupSize: this.props.groupSize,
            costEstimate: this.props.costEstimate,
            arriving: this.arriving,
            departing: this.departing,
            facilities: this.props.facilities.values,
        };
    }

    /**
     * Builds a freshly imported booking at status New.
     */
    static import(params: {
        id: string;
        externalKey: string;
        details: BookingDetails;
        submitted?: Date;
        bookersComment?: string;
        originalSourceData: Record<string, string>;
        importedAt: Date;
    }): Booking {
        const problems = Booking.validateDetails(params.details);
        if (problems.length > 0) {
            throw new InvalidFieldValueError(problems, params.id);
        }

        return new Booking(params.id, {
            externalKey: params.externalKey,
            groupName: params.details.groupName,
            leaderName: params.details.leaderName,
            leaderPhone: params.details.leaderPhone,
            leaderEmail: params.details.leaderEmail,
            groupType: params.details.groupType,
            groupSize: params.details.groupSize,
            costEstimate: params.details.costEstimate,
            stay: StayInterval.create(params.details.arriving, params.details.departing),
            facilities: FacilitySet.create(params.details.facilities),
            submitted: params.submitted,
            originalSourceData: Object.freeze({ ...params.originalSourceData }),
            status: BookingStatus.initial(),
            bookersComment: params.bookersComment,
            notes: [{ at: params.importedAt, actor: 'system', text: 'Pulled from source' }],
            createdAt: params.importedAt,
            updatedAt: params.importedAt,
        });
    }

    static reconstitute(id: string, props: BookingProps): Booking {
        return new Booking(id, props);
    }

    static fromSnapshot(snapshot: BookingSnapshot): Booking {
        return new Booking(snapshot.id, {
            externalKey: snapshot.externalKey,
            groupName: snapshot.groupName,
            leaderName: snapshot.leaderName,
            leaderPhone: snapshot.leaderPhone,
            leaderEmail: snapshot.leaderEmail,
            groupType: snapshot.groupType,
            groupSize: snapshot.groupSize,
            costEstimate: snapshot.costEstimate,
            stay: StayInterval.create(snapshot.arriving, snapshot.departing),
            facilities: FacilitySet.create(snapshot.facilities),
            submitted: snapshot.submitted ? new Date(snapshot.submitted) : undefined,
            originalSourceData: Object.freeze({ ...snapshot.originalSourceData }),
            status: BookingStatus.fromString(snapshot.tracking.status),
            pendQuestion: snapshot.tracking.pendQuestion,
            cancelReason: snapshot.tracking.cancelReason,
            bookersComment: snapshot.tracking.bookersComment,
            notes: snapshot.tracking.notes.map(note => ({ ...note, at: new Date(note.at) })),
            createdAt: new Date(snapshot.createdAt),
            updatedAt: new Date(snapshot.updatedAt),
        });
    }

    toSnapshot(): BookingSnapshot {
        return {
            id: this.id,
            externalKey: this.props.externalKey,
            ...this.details,
            submitted: this.props.submitted ? new Date(this.props.submitted) : undefined,
            originalSourceData: { ...this.props.originalSourceData },
            tracking: this.tracking,
            createdAt: new Date(this.props.createdAt),
            updatedAt: new Date(this.props.updatedAt),
        };
    }

    /**
     * Applies the side effects of a transition already cleared by
     * StatusTransitionPolicy. Status, field clears, the note and the
     * lifecycle event change together.
     */
    transitionTo(target: BookingStatusValue, context: TransitionContext): void {
        const from = this.props.status;
        if (!from.canTransitionTo(target)) {
            throw new Error(`Transition ${from.value} > ${target} is not in the transition table`);
        }

        this.props.status = BookingStatus.of(target);

        if (from.value === 'Pending') {
            this.props.pendQuestion = undefined;
        }
        if (target === 'Pending') {
            this.props.pendQuestion = context.reason;
        }
        if (target === 'Cancelled') {
            this.props.cancelReason = context.reason;
        }
        if (from.isCancelled && target === 'New') {
            this.props.cancelReason = undefined;
        }

        const label = REASON_LABELS[target];
        const text = context.note ?? `Status changed [${from.value}] > [${target}]`;
        this.appendNote(label && context.reason ? `${text} - ${label}: ${context.reason}` : text, context.actor, context.at);

        this.addDomainEvent(new BookingStatusChangedEvent(
            this.id,
            from.value,
            target,
            context.actor,
            this.props.leaderEmail,
            context.reason,
            context.at,
        ));
    }

    /**
     * Applies an edit to the booking fields and records one note per changed field.
     * Returns the names of the fields that actually changed.
     */
    applyFieldChanges(values: BookingFieldValues, context: { actor: string; at: Date }): BookingField[] {
        if (!this.props.status.isEditable) {
            throw new ReadOnlyBookingError(this.id, this.props.status.value);
        }

        const current: BookingFieldValues = { ...this.details, bookersComment: this.props.bookersComment };
        const next: BookingDetails = { ...this.details };
        for (const field of BOOKING_FIELDS) {
            if (field === 'bookersComment') continue;
            const value = values[field];
            if (value !== undefined) {
                Object.assign(next, { [field]: value });
            }
        }

        const problems = Booking.validateDetails(next);
        if (problems.length > 0) {
            throw new InvalidFieldValueError(problems, this.id);
        }

        const changed: BookingField[] = [];
        for (const field of BOOKING_FIELDS) {
            const before = current[field];
            const after = values[field];
            if (after === undefined || Booking.sameValue(before, after)) continue;
            changed.push(field);
            this.appendNote(
                `${field} changed from [${Booking.formatValue(before)}] to [${Booking.formatValue(after)}]`,
                context.actor,
                context.at,
            );
        }

        if (changed.length === 0) return changed;

        this.props.groupName = next.groupName;
        this.props.leaderName = next.leaderName;
        this.props.leaderPhone = next.leaderPhone;
        this.props.leaderEmail = next.leaderEmail;
        this.props.groupType = next.groupType;
        this.props.groupSize = next.groupSize;
        this.props.costEstimate = next.costEstimate;
        this.props.stay = StayInterval.create(next.arriving, next.departing);
        this.props.facilities = FacilitySet.create(next.facilities);
        if (values.bookersComment !== undefined) {
            this.props.bookersComment = values.bookersComment;
        }
        this.props.updatedAt = context.at;

        return changed;
    }

    private appendNote(text: string, actor: string, at: Date): void {
        this.props.notes = [...this.props.notes, { at, actor, text }];
        this.props.updatedAt = at;
    }

    static validateDetails(details: BookingDetails): string[] {
        const problems: string[] = [];
        if (!Number.isInteger(details.groupSize) || details.groupSize <= 0) {
            problems.push('groupSize must be a positive integer');
        }
        if (!Number.isInteger(details.costEstimate) || details.costEstimate < 0) {
            problems.push('costEstimate must be a non-negative integer');
        }
        if (Number.isNaN(details.arriving.getTime()) || Number.isNaN(details.departing.getTime())) {
            problems.push('arriving and departing must be valid dates');
        } else if (details.arriving.getTime() >= details.departing.getTime()) {
            problems.push('arriving must be before departing');
        }
        if (FacilitySet.create(details.facilities).isEmpty) {
            problems.push('at least one facility is required');
        }
        return problems;
    }

    private static sameValue(before: unknown, after: unknown): boolean {
        if (before instanceof Date && after instanceof Date) {
            return before.getTime() === after.getTime();
        }
        if (Array.isArray(before) && Array.isArray(after)) {
            return FacilitySet.create(before.map(String)).equals(FacilitySet.create(after.map(String)));
        }
        return before === after;
    }

    private static formatValue(value: unknown): string {
        if (value === undefined || value === null) return '';
        if (value instanceof Date) return value.toISOString();
        if (Array.isArray(value)) return FacilitySet.create(value.map(String)).toString();
        return String(value);
    }
}
