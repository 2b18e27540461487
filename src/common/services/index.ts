export * from './logger.service';
