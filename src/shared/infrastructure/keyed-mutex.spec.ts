import { KeyedMutex } from './keyed-mutex';

const deferred = () => {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((done) => {
        resolve = done;
    });
    return { promise, resolve };
};

describe('KeyedMutex', () => {
    it('runs tasks on the same key one after another', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];
        const gate = deferred();

        const first = mutex.runExclusive('booking:A', async () => {
            order.push('first:start');
            await gate.promise;
            order.push('first:end');
        });
        const second = mutex.runExclusive('booking:A', async () => {
            order.push('second');
        });

        await Promise.resolve();
        expect(mutex.isLocked('booking:A')).toBe(true);
        gate.resolve();
        await Promise.all([first, second]);

        expect(order).toEqual(['first:start', 'first:end', 'second']);
        expect(mutex.isLocked('booking:A')).toBe(false);
    });

    it('lets different keys run side by side', async () => {
        const mutex = new KeyedMutex();
        const gate = deferred();
        const order: string[] = [];

        const slow = mutex.runExclusive('booking:A', async () => {
            await gate.promise;
            order.push('A');
        });
        await mutex.runExclusive('booking:B', async () => {
            order.push('B');
        });
        gate.resolve();
        await slow;

        expect(order).toEqual(['B', 'A']);
    });

    it('releases the key when a task fails', async () => {
        const mutex = new KeyedMutex();

        await expect(mutex.runExclusive('k', async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        await expect(mutex.runExclusive('k', async () => 'next')).resolves.toBe('next');
        expect(mutex.isLocked('k')).toBe(false);
    });

    it('holds a set of keys regardless of the order they are given in', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];
        const gate = deferred();

        const first = mutex.runExclusiveAll(['facility:Kitchen', 'facility:Hall'], async () => {
            order.push('first:start');
            await gate.promise;
            order.push('first:end');
        });
        const second = mutex.runExclusiveAll(['facility:Hall', 'facility:Kitchen'], async () => {
            order.push('second');
        });

        await Promise.resolve();
        gate.resolve();
        await Promise.all([first, second]);

        expect(order).toEqual(['first:start', 'first:end', 'second']);
    });
});
