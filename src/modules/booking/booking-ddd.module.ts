import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BOOKING_CONFIG } from '../../common/config/booking.config';
import type { BookingConfig } from '../../common/config/booking.config';
import { DatabaseModule } from '../../database/database.module';
import { BookingNotificationHandler } from './application/event-handlers/booking-notification.handler';
import { BookingMaintenanceScheduler } from './application/schedulers/booking-maintenance.scheduler';
import { ArchivalSweeperService } from './application/services/archival-sweeper.service';
import { BookingLockService } from './application/services/booking-lock.service';
import { BookingQueryService } from './application/services/booking-query.service';
import { ConflictDetectorService } from './application/services/conflict-detector.service';
import { ReconciliationEngineService } from './application/services/reconciliation-engine.service';
import { StatusStateMachineService } from './application/services/status-state-machine.service';
import { BOOKING_CLOCK, systemClock } from './domain/gateways/clock.interface';
import { NOTIFICATION_GATEWAY } from './domain/gateways/notification-gateway.interface';
import { RAW_ROW_SOURCE } from './domain/gateways/raw-row-source.interface';
import { BOOKING_STORE } from './domain/repositories/booking-store.interface';
import { LoggingNotificationGateway } from './infrastructure/notification/logging-notification.gateway';
import { PgBookingStore } from './infrastructure/persistence/pg-booking.store';
import { TimedBookingStore } from './infrastructure/persistence/timed-booking.store';
import { FIELD_MAPPINGS, loadFieldMappings } from './infrastructure/source/field-mappings';
import { RawRowMapper } from './infrastructure/source/raw-row.mapper';
import { SheetExportRowSource } from './infrastructure/source/sheet-export.source';

@Module({
    imports: [DatabaseModule],
    providers: [
        {
            provide: BOOKING_CONFIG,
            useFactory: (configService: ConfigService): BookingConfig =>
                configService.getOrThrow<BookingConfig>('booking'),
            inject: [ConfigService],
        },
        PgBookingStore,
        {
            provide: BOOKING_STORE,
            useFactory: (store: PgBookingStore, config: BookingConfig) =>
                new TimedBookingStore(store, config.storeTimeoutMs),
            inject: [PgBookingStore, BOOKING_CONFIG],
        },
        {
            provide: FIELD_MAPPINGS,
            useFactory: (config: BookingConfig) => loadFieldMappings(config.fieldMappingsPath),
            inject: [BOOKING_CONFIG],
        },
        {
            provide: RAW_ROW_SOURCE,
            useFactory: (config: BookingConfig) =>
                config.sourceUrl ? new SheetExportRowSource(config.sourceUrl, config.storeTimeoutMs * 6) : null,
            inject: [BOOKING_CONFIG],
        },
        {
            provide: NOTIFICATION_GATEWAY,
            useClass: LoggingNotificationGateway,
        },
        {
            provide: BOOKING_CLOCK,
            useValue: systemClock,
        },
        RawRowMapper,
        BookingLockService,
        ConflictDetectorService,
        StatusStateMachineService,
        ReconciliationEngineService,
        ArchivalSweeperService,
        BookingQueryService,
        BookingNotificationHandler,
        BookingMaintenanceScheduler,
    ],
    exports: [
        BOOKING_STORE,
        StatusStateMachineService,
        ConflictDetectorService,
        ReconciliationEngineService,
        ArchivalSweeperService,
        BookingQueryService,
        BookingMaintenanceScheduler,
    ],
})
export class BookingDddModule { }
