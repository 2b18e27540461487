export const BOOKING_CLOCK = Symbol('BOOKING_CLOCK');

export interface Clock {
    now(): Date;
}

export const systemClock: Clock = {
    now: () => new Date(),
};
