import { Inject, Injectable } from '@nestjs/common';
import { DatabaseClient } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import {
    ActiveBookingFilter,
    Booking,
    ExternalKeyMatch,
    IBookingStore,
    StoreConflictError,
    StoreNotFoundError,
    StoreUnavailableError,
} from '../../domain/index';
import { BOOKING_COLUMNS, BookingMapper, BookingRow } from './booking.mapper';

interface PgErrorLike {
    code?: string;
    constraint?: string;
    message?: string;
}

const UNAVAILABLE_CODES = new Set(['57P01', '57P02', '57P03', '57014', '53300', 'ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND']);

// Fixed at import.
const IMMUTABLE_COLUMNS = new Set<string>(['id', 'external_key', 'original_source_data', 'created_at']);

const COLUMN_LIST = BOOKING_COLUMNS.join(', ');
const PLACEHOLDERS = BOOKING_COLUMNS.map((_, index) => `$${index + 1}`).join(', ');

@Injectable()
export class PgBookingStore implements IBookingStore {
    constructor(@Inject(DATABASE_CLIENT) private readonly db: DatabaseClient) { }

    async create(booking: Booking): Promise<void> {
        await this.run('create', async () => {
            await this.db.query(
                `INSERT INTO bookings (${COLUMN_LIST}) VALUES (${PLACEHOLDERS})`,
                BookingMapper.toPersistence(booking),
            );
        }, booking.externalKey);
    }

    async get(id: string): Promise<Booking | null> {
        return this.run('get', async () => {
            const result = await this.db.query<BookingRow>(
                `SELECT ${COLUMN_LIST} FROM bookings WHERE id = $1`,
                [id],
            );
            if (result.rows.length === 0) return null;
            return BookingMapper.toDomain(result.rows[0]);
        });
    }

    async getByExternalKey(externalKey: string): Promise<ExternalKeyMatch | null> {
        return this.run('getByExternalKey', async () => {
            const result = await this.db.query<BookingRow & { archived: boolean }>(
                `SELECT ${COLUMN_LIST}, false AS archived FROM bookings WHERE external_key = $1
                UNION ALL
                SELECT ${COLUMN_LIST}, true AS archived FROM bookings_archive WHERE external_key = $1
                ORDER BY archived ASC
                LIMIT 1`,
                [externalKey],
            );
            if (result.rows.length === 0) return null;
            const row = result.rows[0];
            return { booking: BookingMapper.toDomain(row), archived: row.archived };
        });
    }

    async updateTracking(booking: Booking): Promise<void> {
        const tracking = booking.tracking;
        await this.run('updateTracking', async () => {
            const result = await this.db.query(
                `UPDATE bookings SET
                    status = $2,
                    pend_question = $3,
                    cancel_reason = $4,
                    bookers_comment = $5,
                    notes = $6,
                    updated_at = $7
                WHERE id = $1`,
                [
                    booking.id,
                    tracking.status,
                    tracking.pendQuestion ?? null,
                    tracking.cancelReason ?? null,
                    tracking.bookersComment ?? null,
                    JSON.stringify(tracking.notes.map(note => ({ ...note, at: note.at.toISOString() }))),
                    booking.updatedAt,
                ],
            );
            if ((result.rowCount ?? 0) === 0) throw new StoreNotFoundError(booking.id);
        });
    }

    async updateBookingFields(booking: Booking): Promise<void> {
        const row = BookingMapper.toPersistence(booking);
        const values: unknown[] = [booking.id];
        const assignments: string[] = [];
        BOOKING_COLUMNS.forEach((column, index) => {
            if (IMMUTABLE_COLUMNS.has(column)) return;
            values.push(row[index]);
            assignments.push(`${column} = $${values.length}`);
        });

        await this.run('updateBookingFields', async () => {
            const result = await this.db.query(
                `UPDATE bookings SET ${assignments.join(', ')} WHERE id = $1`,
                values,
            );
            if ((result.rowCount ?? 0) === 0) throw new StoreNotFoundError(booking.id);
        });
    }

    async listActive(filter: ActiveBookingFilter = {}): Promise<Booking[]> {
        const conditions: string[] = [];
        const values: unknown[] = [];
        const bind = (value: unknown): string => {
            values.push(value);
            return `$${values.length}`;
        };

        if (filter.id) conditions.push(`id = ${bind(filter.id)}`);
        if (filter.statuses) conditions.push(`status = ANY(${bind([...filter.statuses])}::text[])`);
        if (filter.excludeStatuses) conditions.push(`NOT (status = ANY(${bind([...filter.excludeStatuses])}::text[]))`);
        if (filter.facilities) conditions.push(`facilities && ${bind([...filter.facilities])}::text[]`);
        if (filter.overlapping) {
            conditions.push(`arriving < ${bind(filter.overlapping.end)}`);
            conditions.push(`departing > ${bind(filter.overlapping.start)}`);
        }
        if (filter.departingBefore) conditions.push(`departing < ${bind(filter.departingBefore)}`);

        const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

        return this.run('listActive', async () => {
            const result = await this.db.query<BookingRow>(
                `SELECT ${COLUMN_LIST} FROM bookings ${where} ORDER BY arriving ASC, id ASC`,
                values,
            );
            return result.rows.map(row => BookingMapper.toDomain(row));
        });
    }

    async moveToArchive(id: string): Promise<void> {
        await this.run('moveToArchive', async () => {
            await this.db.transaction(async (client) => {
                const copied = await client.query(
                    `INSERT INTO bookings_archive (${COLUMN_LIST}, archived_at)
                    SELECT ${COLUMN_LIST}, NOW() FROM bookings WHERE id = $1`,
                    [id],
                );
                if ((copied.rowCount ?? 0) === 0) throw new StoreNotFoundError(id);
                await client.query('DELETE FROM bookings WHERE id = $1', [id]);
            });
        });
    }

    async getArchived(id: string): Promise<Booking | null> {
        return this.run('getArchived', async () => {
            const result = await this.db.query<BookingRow>(
                `SELECT ${COLUMN_LIST} FROM bookings_archive WHERE id = $1`,
                [id],
            );
            if (result.rows.length === 0) return null;
            return BookingMapper.toDomain(result.rows[0]);
        });
    }

    private async run<T>(operation: string, work: () => Promise<T>, key?: string): Promise<T> {
        try {
            return await work();
        } catch (error) {
            throw this.translate(error, operation, key);
        }
    }

    private translate(error: unknown, operation: string, key?: string): unknown {
        if (error instanceof StoreNotFoundError || error instanceof StoreConflictError) return error;

        const pgError = this.describe(error);

        if (pgError.code === '23505') {
            const constraint = pgError.constraint?.includes('external_key') ? 'external_key' : 'id';
            return new StoreConflictError(key ?? 'unknown', constraint);
        }

        if (
            (pgError.code && (pgError.code.startsWith('08') || UNAVAILABLE_CODES.has(pgError.code))) ||
            pgError.message?.toLowerCase().includes('timeout')
        ) {
            return new StoreUnavailableError(operation, error);
        }

        return error;
    }

    private describe(error: unknown): PgErrorLike {
        if (typeof error !== 'object' || error === null) return {};
        return {
            code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
            constraint: 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : undefined,
            message: error instanceof Error ? error.message : undefined,
        };
    }
}
