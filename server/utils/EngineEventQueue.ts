import { logError } from './logger';

type Processor<T> = (event: T) => void | Promise<void>;

export interface EngineEventQueueOptions<T> {
    maxQueueSize?: number;
    // events the queue may shed under overload; others are always kept
    isDroppable?: (event: T) => boolean;
    onDrop?: (event: T) => void;
}

/**
 * Single-consumer queue. Producers only enqueue; exactly one event is being
 * processed at any time, in arrival order, so the processor never races
 * itself against shared state.
 */
export class EngineEventQueue<T> {
    private queue: T[] = [];
    private head = 0;
    private processing = false;
    private readonly maxQueueSize: number;
    private readonly isDroppable: (event: T) => boolean;
    private readonly onDrop: (event: T) => void;
    private dropped = 0;
    private processed = 0;
    private idleWaiters: Array<() => void> = [];

    constructor(
        private readonly name: string,
        private readonly processor: Processor<T>,
        options: EngineEventQueueOptions<T> = {}
    ) {
        const max = Number(options.maxQueueSize ?? 5000);
        this.maxQueueSize = Number.isFinite(max) && max > 100 ? Math.trunc(max) : 5000;
        this.isDroppable = options.isDroppable ?? (() => true);
        this.onDrop = options.onDrop ?? (() => undefined);
    }

    public enqueue(event: T): void {
        if (this.getQueueLength() >= this.maxQueueSize) {
            this.dropOldestDroppable();
        }
        this.queue.push(event);
        this.compactIfNeeded();
        void this.processNext();
    }

    /** Resolves once every queued event has been processed. */
    public onIdle(): Promise<void> {
        if (!this.processing && this.getQueueLength() === 0) return Promise.resolve();
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    public getQueueLength(): number {
        return Math.max(0, this.queue.length - this.head);
    }

    public getDroppedCount(): number {
        return this.dropped;
    }

    public getProcessedCount(): number {
        return this.processed;
    }

    private async processNext(): Promise<void> {
        if (this.processing) return;
        if (this.getQueueLength() === 0) {
            this.notifyIdle();
            return;
        }

        this.processing = true;
        const event = this.queue[this.head];
        this.head += 1;

        try {
            await this.processor(event);
        } catch (e) {
            logError('QUEUE_PROCESS_ERROR', e, { queue: this.name });
        } finally {
            this.processed += 1;
            this.processing = false;
            this.compactIfNeeded();
            setImmediate(() => {
                void this.processNext();
            });
        }
    }

    private dropOldestDroppable(): void {
        for (let i = this.head; i < this.queue.length; i += 1) {
            const event = this.queue[i];
            if (this.isDroppable(event)) {
                this.queue.splice(i, 1);
                this.dropped += 1;
                logError('QUEUE_EVENT_DROPPED', 'queue full', { queue: this.name, dropped: this.dropped });
                this.onDrop(event);
                return;
            }
        }
    }

    private notifyIdle(): void {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
    }

    private compactIfNeeded(): void {
        if (this.head > 0 && (this.head >= 2048 || this.head > (this.queue.length >> 1))) {
            this.queue = this.queue.slice(this.head);
            this.head = 0;
        }
    }
}
