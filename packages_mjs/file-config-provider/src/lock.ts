import { Semaphore } from 'async-mutex';

const DEFAULT_MAX_READERS = 1024;

/**
 * Reader/writer lock over a weighted semaphore. A reader takes one unit,
 * a writer takes all of them, so writers wait for in-flight readers and
 * block new ones until they finish.
 */
export class ReadWriteLock {
    private semaphore: Semaphore;

    constructor(private maxReaders: number = DEFAULT_MAX_READERS) {
        this.semaphore = new Semaphore(maxReaders);
    }

    read<T>(fn: () => Promise<T> | T): Promise<T> {
        return this.semaphore.runExclusive(() => fn(), 1);
    }

    write<T>(fn: () => Promise<T> | T): Promise<T> {
        return this.semaphore.runExclusive(() => fn(), this.maxReaders);
    }
}
