import {
    ActiveBookingFilter,
    Booking,
    ExternalKeyMatch,
    IBookingStore,
    StoreUnavailableError,
} from '../../domain/index';

/**
 * Bounds every call on the wrapped store. A call that outlives the timeout
 * fails with StoreUnavailableError instead of blocking the caller.
 *
 * A write that times out may still land. Until it settles, later calls wait
 * for it (inside their own deadline) so nothing reads or overwrites the
 * booking around it.
 */
export class TimedBookingStore implements IBookingStore {
    private readonly lateWrites = new Set<Promise<unknown>>();

    constructor(
        private readonly inner: IBookingStore,
        private readonly timeoutMs: number,
    ) { }

    create(booking: Booking): Promise<void> {
        return this.guard('create', () => this.inner.create(booking), { bookingId: booking.id, write: true });
    }

    get(id: string): Promise<Booking | null> {
        return this.guard('get', () => this.inner.get(id), { bookingId: id });
    }

    getByExternalKey(externalKey: string): Promise<ExternalKeyMatch | null> {
        return this.guard('getByExternalKey', () => this.inner.getByExternalKey(externalKey));
    }

    updateTracking(booking: Booking): Promise<void> {
        return this.guard('updateTracking', () => this.inner.updateTracking(booking), { bookingId: booking.id, write: true });
    }

    updateBookingFields(booking: Booking): Promise<void> {
        return this.guard('updateBookingFields', () => this.inner.updateBookingFields(booking), { bookingId: booking.id, write: true });
    }

    listActive(filter?: ActiveBookingFilter): Promise<Booking[]> {
        return this.guard('listActive', () => this.inner.listActive(filter));
    }

    moveToArchive(id: string): Promise<void> {
        return this.guard('moveToArchive', () => this.inner.moveToArchive(id), { bookingId: id, write: true });
    }

    getArchived(id: string): Promise<Booking | null> {
        return this.guard('getArchived', () => this.inner.getArchived(id), { bookingId: id });
    }

    private guard<T>(
        operation: string,
        call: () => Promise<T>,
        options: { bookingId?: string; write?: boolean } = {},
    ): Promise<T> {
        let timedOut = false;
        const unavailable = () => new StoreUnavailableError(
            operation,
            new Error(`Timed out after ${this.timeoutMs}ms`),
            options.bookingId,
        );

        const execution = (async (): Promise<T> => {
            await this.settleLateWrites();
            if (timedOut) {
                throw unavailable();
            }
            return call();
        })();

        return new Promise<T>((resolve, reject) => {
            const timer = setTimeout(() => {
                timedOut = true;
                if (options.write) {
                    this.trackLateWrite(execution);
                }
                reject(unavailable());
            }, this.timeoutMs);

            execution.then(
                (value) => {
                    clearTimeout(timer);
                    resolve(value);
                },
                (error: unknown) => {
                    clearTimeout(timer);
                    reject(error);
                },
            );
        });
    }

    private trackLateWrite(write: Promise<unknown>): void {
        this.lateWrites.add(write);
        const forget = () => {
            this.lateWrites.delete(write);
        };
        void write.then(forget, forget);
    }

    private async settleLateWrites(): Promise<void> {
        while (this.lateWrites.size > 0) {
            await Promise.allSettled([...this.lateWrites]);
        }
    }
}
