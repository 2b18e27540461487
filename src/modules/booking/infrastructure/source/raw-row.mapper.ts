import { Inject, Injectable } from '@nestjs/common';
import { createHash } from 'crypto';
import { getYear, isValid, parse, parseISO, set } from 'date-fns';
import { Booking, BookingDetails } from '../../domain/aggregates/booking.aggregate';
import { MalformedRowError } from '../../domain/errors/booking.errors';
import { RawSourceRow } from '../../domain/gateways/raw-row-source.interface';
import { FacilitySet } from '../../domain/value-objects/facility-set.vo';
import { FIELD_MAPPINGS, FieldMappings, GroupTypeDefinition } from './field-mappings';

export interface MappedRow {
    id: string;
    externalKey: string;
    details: BookingDetails;
    submitted?: Date;
    bookersComment?: string;
    /** The row exactly as the source delivered it. */
    originalSourceData: Record<string, string>;
}

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const MONEY = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Turns one raw sheet row into the values a new Booking is built from.
 * Every rejection is a MalformedRowError carrying the row index.
 */
@Injectable()
export class RawRowMapper {
    constructor(
        @Inject(FIELD_MAPPINGS)
        private readonly mappings: FieldMappings,
    ) {}

    /** `"Name of Lead Person"` becomes `name_of_lead_person`. */
    static normalizeKey(header: string): string {
        return header
            .trim()
            .toLowerCase()
            .replace(/[^a-z0-9]+/g, '_')
            .replace(/^_+|_+$/g, '');
    }

    static normalizeRow(row: RawSourceRow): Map<string, string> {
        const normalized = new Map<string, string>();
        for (const [header, value] of Object.entries(row)) {
            normalized.set(RawRowMapper.normalizeKey(header), value.trim());
        }
        return normalized;
    }

    /**
     * Stable identity of a submission. A submission reference column wins;
     * otherwise the SHA-256 of the configured identifying fields.
     */
    externalKeyOf(row: RawSourceRow, rowIndex: number): string {
        const cells = RawRowMapper.normalizeRow(row);
        const referenceColumn = this.mappings.keyMapping.booking.submissionReference;
        const reference = referenceColumn ? this.cell(cells, referenceColumn) : '';
        if (reference) return reference;

        const parts = this.mappings.externalKeyFields.map(field => `${RawRowMapper.normalizeKey(field)}=${this.cell(cells, field)}`);
        if (this.mappings.externalKeyFields.every(field => this.cell(cells, field) === '')) {
            throw new MalformedRowError(rowIndex, 'row has none of the identifying fields');
        }
        return createHash('sha256').update(parts.join('|')).digest('hex');
    }

    static bookingId(prefix: string, arriving: Date, externalKey: string): string {
        const digest = createHash('sha256').update(externalKey).digest('hex').slice(0, 8).toUpperCase();
        return `${prefix}-${getYear(arriving)}-${digest}`;
    }

    map(row: RawSourceRow, rowIndex: number, batchGroupType?: string): MappedRow {
        const cells = RawRowMapper.normalizeRow(row);
        const { leader, booking } = this.mappings.keyMapping;
        const missing: string[] = [];
        const required = (column: string, label: string): string => {
            const value = this.cell(cells, column);
            if (!value) missing.push(label);
            return value;
        };

        const leaderName = required(leader.name, 'leader name');
        const leaderEmail = required(leader.email, 'leader email');
        const leaderPhone = required(leader.phone, 'leader phone');
        const groupName = required(booking.groupName, 'group name');
        const groupSizeText = required(booking.groupSize, 'group size');
        const facilitiesText = required(booking.facilities, 'facilities');
        const arrivingText = required(booking.arriving, 'arriving');
        if (missing.length > 0) {
            throw new MalformedRowError(rowIndex, `missing ${missing.join(', ')}`);
        }

        const groupTypeText = (booking.groupType ? this.cell(cells, booking.groupType) : '')
            || batchGroupType
            || this.mappings.defaultGroupType;
        const groupType = this.resolveGroupType(groupTypeText);
        if (!groupType) {
            throw new MalformedRowError(rowIndex, `unknown group type ${groupTypeText}`);
        }

        const arriving = this.parseDate(arrivingText);
        if (!arriving) {
            throw new MalformedRowError(rowIndex, `arriving is not a date: ${arrivingText}`);
        }
        const departing = this.departureOf(cells, arriving, rowIndex);

        if (!/^\d+$/.test(groupSizeText)) {
            throw new MalformedRowError(rowIndex, `group size is not a whole number: ${groupSizeText}`);
        }

        const details: BookingDetails = {
            groupName,
            leaderName,
            leaderPhone,
            leaderEmail,
            groupType: groupType.key,
            groupSize: Number(groupSizeText),
            costEstimate: this.parseCost(booking.costEstimate ? this.cell(cells, booking.costEstimate) : '', rowIndex),
            arriving,
            departing,
            facilities: FacilitySet.create(facilitiesText.split(/[,;]/)).values,
        };

        const problems = Booking.validateDetails(details);
        if (problems.length > 0) {
            throw new MalformedRowError(rowIndex, problems.join('; '));
        }

        const externalKey = this.externalKeyOf(row, rowIndex);
        const submittedText = booking.submitted ? this.cell(cells, booking.submitted) : '';
        const bookersComment = booking.bookersComment ? this.cell(cells, booking.bookersComment) : '';

        return {
            id: RawRowMapper.bookingId(groupType.definition.prefix, arriving, externalKey),
            externalKey,
            details,
            submitted: submittedText ? this.parseDate(submittedText) : undefined,
            bookersComment: bookersComment || undefined,
            originalSourceData: { ...row },
        };
    }

    private departureOf(cells: Map<string, string>, arriving: Date, rowIndex: number): Date {
        const { departing, departureTime } = this.mappings.keyMapping.booking;

        const departingText = departing ? this.cell(cells, departing) : '';
        if (departingText) {
            const parsed = this.parseDate(departingText);
            if (!parsed) {
                throw new MalformedRowError(rowIndex, `departing is not a date: ${departingText}`);
            }
            return parsed;
        }

        const timeText = departureTime ? this.cell(cells, departureTime) : '';
        const time = TIME_OF_DAY.exec(timeText);
        if (!time) {
            throw new MalformedRowError(rowIndex, timeText ? `departure time is not a time: ${timeText}` : 'missing departing');
        }
        return set(arriving, {
            hours: Number(time[1]),
            minutes: Number(time[2]),
            seconds: Number(time[3] ?? 0),
            milliseconds: 0,
        });
    }

    private parseDate(text: string): Date | undefined {
        const formatted = parse(text, this.mappings.dateFormat, new Date());
        if (isValid(formatted)) return formatted;
        const iso = parseISO(text);
        return isValid(iso) ? iso : undefined;
    }

    /** Major-unit amount to minor units: `"120.50"` is 12050, blank is 0. */
    private parseCost(text: string, rowIndex: number): number {
        const cleaned = text.replace(/[^\d.]/g, '');
        if (!cleaned) return 0;
        const match = MONEY.exec(cleaned);
        if (!match) {
            throw new MalformedRowError(rowIndex, `cost estimate is not an amount: ${text}`);
        }
        return Number(match[1]) * 100 + Number((match[2] ?? '').padEnd(2, '0'));
    }

    /** Canonical key of a declared group type, matched by key or description. */
    groupTypeKey(text: string): string | undefined {
        return this.resolveGroupType(text)?.key;
    }

    private resolveGroupType(text: string): { key: string; definition: GroupTypeDefinition } | undefined {
        const wanted = text.trim().toLowerCase();
        for (const [key, definition] of Object.entries(this.mappings.groupTypes)) {
            if (key.toLowerCase() === wanted || definition.description.toLowerCase() === wanted) {
                return { key, definition };
            }
        }
        return undefined;
    }

    private cell(cells: Map<string, string>, column: string): string {
        return cells.get(RawRowMapper.normalizeKey(column)) ?? '';
    }
}
