import {
    ActiveBookingFilter,
    Booking,
    BookingSnapshot,
    ExternalKeyMatch,
    IBookingStore,
    StoreConflictError,
    StoreNotFoundError,
} from '../../domain/index';

/**
 * In-process BookingStore. Keeps snapshots rather than live aggregates so a
 * caller mutating a loaded booking changes nothing until it writes back.
 */
export class InMemoryBookingStore implements IBookingStore {
    private readonly active = new Map<string, BookingSnapshot>();
    private readonly archive = new Map<string, BookingSnapshot>();

    async create(booking: Booking): Promise<void> {
        if (this.active.has(booking.id) || this.archive.has(booking.id)) {
            throw new StoreConflictError(booking.id, 'id');
        }
        for (const snapshot of this.active.values()) {
            if (snapshot.externalKey === booking.externalKey) {
                throw new StoreConflictError(booking.externalKey, 'external_key');
            }
        }
        this.active.set(booking.id, booking.toSnapshot());
    }

    async get(id: string): Promise<Booking | null> {
        const snapshot = this.active.get(id);
        return snapshot ? Booking.fromSnapshot(snapshot) : null;
    }

    async getByExternalKey(externalKey: string): Promise<ExternalKeyMatch | null> {
        for (const [partition, archived] of [[this.active, false], [this.archive, true]] as const) {
            for (const snapshot of partition.values()) {
                if (snapshot.externalKey === externalKey) {
                    return { booking: Booking.fromSnapshot(snapshot), archived };
                }
            }
        }
        return null;
    }

    async updateTracking(booking: Booking): Promise<void> {
        const existing = this.active.get(booking.id);
        if (!existing) throw new StoreNotFoundError(booking.id);
        this.active.set(booking.id, {
            ...existing,
            tracking: booking.tracking,
            updatedAt: booking.updatedAt,
        });
    }

    async updateBookingFields(booking: Booking): Promise<void> {
        const existing = this.active.get(booking.id);
        if (!existing) throw new StoreNotFoundError(booking.id);
        this.active.set(booking.id, {
            ...booking.toSnapshot(),
            externalKey: existing.externalKey,
            originalSourceData: existing.originalSourceData,
            createdAt: existing.createdAt,
        });
    }

    async listActive(filter: ActiveBookingFilter = {}): Promise<Booking[]> {
        return [...this.active.values()]
            .filter(snapshot => InMemoryBookingStore.matches(snapshot, filter))
            .sort((a, b) => a.arriving.getTime() - b.arriving.getTime() || a.id.localeCompare(b.id))
            .map(snapshot => Booking.fromSnapshot(snapshot));
    }

    async moveToArchive(id: string): Promise<void> {
        const snapshot = this.active.get(id);
        if (!snapshot) throw new StoreNotFoundError(id);
        this.archive.set(id, snapshot);
        this.active.delete(id);
    }

    async getArchived(id: string): Promise<Booking | null> {
        const snapshot = this.archive.get(id);
        return snapshot ? Booking.fromSnapshot(snapshot) : null;
    }

    get activeCount(): number {
        return this.active.size;
    }

    get archivedCount(): number {
        return this.archive.size;
    }

    private static matches(snapshot: BookingSnapshot, filter: ActiveBookingFilter): boolean {
        const status = snapshot.tracking.status;
        if (filter.id && snapshot.id !== filter.id) return false;
        if (filter.statuses && !filter.statuses.includes(status)) return false;
        if (filter.excludeStatuses?.includes(status)) return false;
        if (filter.facilities && !snapshot.facilities.some(facility => filter.facilities?.includes(facility))) {
            return false;
        }
        if (filter.overlapping) {
            const { start, end } = filter.overlapping;
            if (!(snapshot.arriving.getTime() < end.getTime() && start.getTime() < snapshot.departing.getTime())) {
                return false;
            }
        }
        if (filter.departingBefore && snapshot.departing.getTime() >= filter.departingBefore.getTime()) {
            return false;
        }
        return true;
    }
}
