import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { BOOKING_CONFIG } from '../../../../common/config/booking.config';
import type { BookingConfig } from '../../../../common/config/booking.config';
import { CustomLoggerService } from '../../../../common/services/logger.service';
import { SingleFlight } from '../../../../shared/infrastructure/single-flight';
import { BOOKING_CLOCK } from '../../domain/gateways/clock.interface';
import type { Clock } from '../../domain/gateways/clock.interface';
import { RAW_ROW_SOURCE } from '../../domain/gateways/raw-row-source.interface';
import type { IRawRowSource } from '../../domain/gateways/raw-row-source.interface';
import { ArchivalPolicy } from '../../domain/policies/archival.policy';
import { ArchivalSweeperService } from '../services/archival-sweeper.service';
import { ReconciliationEngineService } from '../services/reconciliation-engine.service';
import { StatusStateMachineService } from '../services/status-state-machine.service';

const RECONCILE_JOB = 'booking-reconciliation';
const SWEEP_JOB = 'booking-archive-sweep';

/**
 * Background passes: pull plus auto-advance, and the archive sweep.
 * A tick that fires while the previous run of the same job is still going
 * joins that run instead of starting another.
 */
@Injectable()
export class BookingMaintenanceScheduler implements OnModuleInit, OnModuleDestroy {
    private readonly flights = new SingleFlight<void>();

    constructor(
        @Inject(BOOKING_CONFIG) private readonly config: BookingConfig,
        @Inject(RAW_ROW_SOURCE) private readonly rowSource: IRawRowSource | null,
        @Inject(BOOKING_CLOCK) private readonly clock: Clock,
        private readonly reconciliation: ReconciliationEngineService,
        private readonly stateMachine: StatusStateMachineService,
        private readonly sweeper: ArchivalSweeperService,
        private readonly schedulerRegistry: SchedulerRegistry,
        private readonly logger: CustomLoggerService,
    ) { }

    onModuleInit(): void {
        this.register(RECONCILE_JOB, this.config.reconcileIntervalMs, () => this.runReconciliation());
        this.register(SWEEP_JOB, this.config.sweepIntervalMs, () => this.runSweep());
    }

    onModuleDestroy(): void {
        for (const name of [RECONCILE_JOB, SWEEP_JOB]) {
            if (this.schedulerRegistry.doesExist('interval', name)) {
                this.schedulerRegistry.deleteInterval(name);
            }
        }
    }

    /** Runs both jobs back to back, logging rather than throwing failures. */
    async runOnce(): Promise<void> {
        await this.runSafely(RECONCILE_JOB, () => this.runReconciliation());
        await this.runSafely(SWEEP_JOB, () => this.runSweep());
    }

    runReconciliation(): Promise<void> {
        return this.flights.run(RECONCILE_JOB, async () => {
            if (this.rowSource) {
                const batches = await this.rowSource.fetchBatches();
                await this.reconciliation.pullBatches(batches);
            } else {
                this.logger.debug('No booking source configured, skipping pull', { operation: RECONCILE_JOB });
            }
            await this.stateMachine.advanceDeparted(this.clock.now());
        });
    }

    runSweep(): Promise<void> {
        return this.flights.run(SWEEP_JOB, async () => {
            const retentionMs = ArchivalPolicy.retentionFromDays(this.config.archiveAfterDays);
            await this.sweeper.sweep(this.clock.now(), retentionMs);
        });
    }

    private register(name: string, intervalMs: number, job: () => Promise<void>): void {
        if (intervalMs <= 0) {
            this.logger.log(`${name} timer disabled`);
            return;
        }
        const interval = setInterval(() => {
            void this.runSafely(name, job);
        }, intervalMs);
        this.schedulerRegistry.addInterval(name, interval);
        this.logger.log(`${name} scheduled every ${intervalMs}ms`);
    }

    private async runSafely(name: string, job: () => Promise<void>): Promise<void> {
        const startedAt = Date.now();
        try {
            await job();
            this.logger.logPerformance(name, Date.now() - startedAt, { operation: name });
        } catch (error) {
            this.logger.logError(error instanceof Error ? error : new Error(String(error)), { operation: name });
        }
    }
}
