export * from './booking.errors';
export * from './booking-store.errors';
