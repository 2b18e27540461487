import { Booking, BookingStatus } from '../../domain/index';

interface StoredNote {
    at: string;
    actor: string;
    text: string;
}

export interface BookingRow {
    id: string;
    external_key: string;
    group_name: string;
    leader_name: string;
    leader_phone: string;
    leader_email: string;
    group_type: string;
    group_size: number;
    cost_estimate: number;
    arriving: Date;
    departing: Date;
    facilities: string[];
    submitted: Date | null;
    original_source_data: Record<string, string>;
    status: string;
    pend_question: string | null;
    cancel_reason: string | null;
    bookers_comment: string | null;
    notes: StoredNote[];
    created_at: Date;
    updated_at: Date;
}

export const BOOKING_COLUMNS = [
    'id', 'external_key', 'group_name', 'leader_name', 'leader_phone', 'leader_email',
    'group_type', 'group_size', 'cost_estimate', 'arriving', 'departing', 'facilities',
    'submitted', 'original_source_data', 'status', 'pend_question', 'cancel_reason',
    'bookers_comment', 'notes', 'created_at', 'updated_at',
] as const;

export class BookingMapper {
    static toDomain(row: BookingRow): Booking {
        return Booking.fromSnapshot({
            id: row.id,
            externalKey: row.external_key,
            groupName: row.group_name,
            leaderName: row.leader_name,
            leaderPhone: row.leader_phone,
            leaderEmail: row.leader_email,
            groupType: row.group_type,
            groupSize: row.group_size,
            costEstimate: row.cost_estimate,
            arriving: new Date(row.arriving),
            departing: new Date(row.departing),
            facilities: row.facilities,
            submitted: row.submitted ? new Date(row.submitted) : undefined,
            originalSourceData: row.original_source_data,
            tracking: {
                status: BookingStatus.fromString(row.status).value,
                pendQuestion: row.pend_question ?? undefined,
                cancelReason: row.cancel_reason ?? undefined,
                bookersComment: row.bookers_comment ?? undefined,
                notes: row.notes.map(note => ({ at: new Date(note.at), actor: note.actor, text: note.text })),
            },
            createdAt: new Date(row.created_at),
            updatedAt: new Date(row.updated_at),
        });
    }

    /** Values in BOOKING_COLUMNS order. */
    static toPersistence(booking: Booking): unknown[] {
        const snapshot = booking.toSnapshot();
        const notes: StoredNote[] = snapshot.tracking.notes.map(note => ({
            at: note.at.toISOString(),
            actor: note.actor,
            text: note.text,
        }));

        return [
            snapshot.id,
            snapshot.externalKey,
            snapshot.groupName,
            snapshot.leaderName,
            snapshot.leaderPhone,
            snapshot.leaderEmail,
            snapshot.groupType,
            snapshot.groupSize,
            snapshot.costEstimate,
            snapshot.arriving,
            snapshot.departing,
            snapshot.facilities,
            snapshot.submitted ?? null,
            JSON.stringify(snapshot.originalSourceData),
            snapshot.tracking.status,
            snapshot.tracking.pendQuestion ?? null,
            snapshot.tracking.cancelReason ?? null,
            snapshot.tracking.bookersComment ?? null,
            JSON.stringify(notes),
            snapshot.createdAt,
            snapshot.updatedAt,
        ];
    }
}
