export * from './booking-status.vo';
export * from './stay-interval.vo';
export * from './facility-set.vo';
