import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CustomLoggerService } from '../../../common/services/logger.service';
import { DomainEventPublisher } from '../../../shared/infrastructure/domain-event-publisher';
import { ArchivalSweeperService } from '../application/services/archival-sweeper.service';
import { BookingLockService } from '../application/services/booking-lock.service';
import { BookingQueryService } from '../application/services/booking-query.service';
import { ConflictDetectorService } from '../application/services/conflict-detector.service';
import { ReconciliationEngineService } from '../application/services/reconciliation-engine.service';
import { StatusStateMachineService } from '../application/services/status-state-machine.service';
import { Booking, BookingSnapshot, TrackingRecord } from '../domain/aggregates/booking.aggregate';
import { BOOKING_CLOCK, Clock } from '../domain/gateways/clock.interface';
import { BOOKING_STORE, IBookingStore } from '../domain/repositories/booking-store.interface';
import { FIELD_MAPPINGS, FieldMappings } from '../infrastructure/source/field-mappings';
import { RawRowMapper } from '../infrastructure/source/raw-row.mapper';

export const NOW = new Date('2025-06-01T09:00:00.000Z');

export class FixedClock implements Clock {
    constructor(public current: Date = NOW) { }

    now(): Date {
        return new Date(this.current);
    }
}

export const TEST_FIELD_MAPPINGS: FieldMappings = {
    defaultGroupType: 'district',
    dateFormat: 'dd/MM/yyyy HH:mm:ss',
    externalKeyFields: ['timestamp', 'email_address'],
    groupTypes: {
        district: { description: 'District', prefix: 'DIS' },
        external: { description: 'External group', prefix: 'EXT' },
    },
    keyMapping: {
        leader: {
            name: 'name_of_lead_person',
            email: 'email_address',
            phone: 'phone_number',
        },
        booking: {
            groupName: 'group_name',
            groupSize: 'number_of_people',
            facilities: 'facilities_required',
            arriving: 'arrival_date_time',
            departing: 'departure_date_time',
            departureTime: 'departure_time',
            submitted: 'timestamp',
            groupType: 'group_type',
            costEstimate: 'cost_estimate',
            bookersComment: 'comments',
        },
    },
};

/** A complete submission as the sheet export delivers it. */
export const SAMPLE_ROW: Record<string, string> = {
    'Timestamp': '01/06/2025 08:30:00',
    'Email Address': 'leader@example.com',
    'Name of Lead Person': 'Sam Leader',
    'Phone Number': '01234 567890',
    'Group Name': '1st Riverside Scouts',
    'Number of People': '12',
    'Facilities Required': 'Hall; Kitchen',
    'Arrival Date Time': '14/07/2025 10:00:00',
    'Departure Date Time': '16/07/2025 11:00:00',
    'Cost Estimate': '£120.50',
    'Comments': 'Bringing a trailer',
};

export function bookingSnapshot(
    overrides: Partial<Omit<BookingSnapshot, 'tracking'>> = {},
    tracking: Partial<TrackingRecord> = {},
): BookingSnapshot {
    return {
        id: 'DIS-2025-00000001',
        externalKey: 'external-1',
        groupName: '1st Riverside Scouts',
        leaderName: 'Sam Leader',
        leaderPhone: '01234 567890',
        leaderEmail: 'leader@example.com',
        groupType: 'district',
        groupSize: 12,
        costEstimate: 0,
        arriving: new Date('2025-07-10T14:00:00.000Z'),
        departing: new Date('2025-07-12T11:00:00.000Z'),
        facilities: ['Hall'],
        submitted: undefined,
        originalSourceData: { 'Group Name': '1st Riverside Scouts' },
        createdAt: NOW,
        updatedAt: NOW,
        ...overrides,
        tracking: {
            status: 'New',
            notes: [],
            ...tracking,
        },
    };
}

export function makeBooking(
    overrides: Partial<Omit<BookingSnapshot, 'tracking'>> = {},
    tracking: Partial<TrackingRecord> = {},
): Booking {
    return Booking.fromSnapshot(bookingSnapshot(overrides, tracking));
}

export function createMockLogger() {
    return {
        setContext: jest.fn(),
        log: jest.fn(),
        error: jest.fn(),
        warn: jest.fn(),
        debug: jest.fn(),
        verbose: jest.fn(),
        logError: jest.fn(),
        logBusinessEvent: jest.fn(),
        logPerformance: jest.fn(),
    };
}

export interface BookingTestContext {
    module: TestingModule;
    events: EventEmitter2;
    logger: ReturnType<typeof createMockLogger>;
    stateMachine: StatusStateMachineService;
    conflictDetector: ConflictDetectorService;
    reconciliation: ReconciliationEngineService;
    sweeper: ArchivalSweeperService;
    queries: BookingQueryService;
    locks: BookingLockService;
}

/**
 * Wires the application services around the given store and clock, with a
 * real in-process event bus and a mocked logger.
 */
export async function createBookingTestContext(store: IBookingStore, clock: Clock = new FixedClock()): Promise<BookingTestContext> {
    const events = new EventEmitter2();
    const logger = createMockLogger();

    const module = await Test.createTestingModule({
        providers: [
            { provide: BOOKING_STORE, useValue: store },
            { provide: BOOKING_CLOCK, useValue: clock },
            { provide: FIELD_MAPPINGS, useValue: TEST_FIELD_MAPPINGS },
            { provide: EventEmitter2, useValue: events },
            { provide: CustomLoggerService, useValue: logger },
            DomainEventPublisher,
            RawRowMapper,
            BookingLockService,
            ConflictDetectorService,
            StatusStateMachineService,
            ReconciliationEngineService,
            ArchivalSweeperService,
            BookingQueryService,
        ],
    }).compile();

    return {
        module,
        events,
        logger,
        stateMachine: module.get(StatusStateMachineService),
        conflictDetector: module.get(ConflictDetectorService),
        reconciliation: module.get(ReconciliationEngineService),
        sweeper: module.get(ArchivalSweeperService),
        queries: module.get(BookingQueryService),
        locks: module.get(BookingLockService),
    };
}
