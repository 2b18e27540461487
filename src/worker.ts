import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CustomLoggerService } from './common/services/logger.service';
import { BookingMaintenanceScheduler } from './modules/booking/application/schedulers/booking-maintenance.scheduler';

/**
 * Background worker: pulls new submissions, advances departed bookings and
 * sweeps old terminal bookings into the archive on the configured timers.
 */
async function main() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const logger = app.get(CustomLoggerService);
  app.useLogger(logger);

  const scheduler = app.get(BookingMaintenanceScheduler);

  logger.log('Booking maintenance worker started');

  // First pass right away; later ones come from the scheduler's intervals.
  await scheduler.runOnce();

  const shutdown = async () => {
    logger.log('Booking maintenance worker shutting down...');
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
  process.on('uncaughtException', (error) => {
    logger.logError(error, {
      operation: 'uncaughtException',
      workerType: 'booking-maintenance',
    });
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    logger.logError(reason instanceof Error ? reason : new Error(String(reason)), {
      operation: 'unhandledRejection',
      workerType: 'booking-maintenance',
    });
    process.exit(1);
  });
}

main().catch((error) => {
  console.error('Fatal error in booking maintenance worker:', error);
  process.exit(1);
});
