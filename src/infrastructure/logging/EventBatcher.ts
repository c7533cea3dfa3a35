import { internalLogger } from './internalLogger';

export interface EventBatcherOptions<T> {
	batchSize: number;
	batchWaitMs: number;
	writeBatch: (batch: T[]) => Promise<void>;
	// events waiting to be written beyond this are discarded; no limit when unset
	queueLimit?: number;
	name?: string;
}

/**
 * Collects events and hands them to `writeBatch` at most `batchSize` at a time. A full batch is
 * written right away, a partial one after `batchWaitMs`. Only one write runs at a time; a failed
 * batch is logged and dropped. Events arriving while `queueLimit` events are waiting are discarded.
 */
export class EventBatcher<T> {
	private _batchSize: number;
	private _batchWaitMs: number;
	private _writeBatch: (batch: T[]) => Promise<void>;
	private _queueLimit: number | undefined;
	private _name: string;

	private _inQueue: T[] = [];
	private _inQueueTimeout: ReturnType<typeof setTimeout> | undefined;

	// events taken from inQueue by the running flush
	private _outQueue: T[] = [];
	private _flushing: Promise<void> | undefined;
	private _droppedCount = 0;
	private _overflowing = false;

	constructor(opts: EventBatcherOptions<T>) {
		this._batchSize = opts.batchSize;
		this._batchWaitMs = opts.batchWaitMs;
		this._writeBatch = opts.writeBatch;
		this._queueLimit = opts.queueLimit;
		this._name = opts.name || 'EventBatcher';
	}

	public get inQueueLength(): number {
		return this._inQueue.length;
	}

	public get outQueueLength(): number {
		return this._outQueue.length;
	}

	public get droppedCount(): number {
		return this._droppedCount;
	}

	public addEvent(ev: T): void {
		if (this._queueLimit !== undefined && this._inQueue.length + this._outQueue.length >= this._queueLimit) {
			this._droppedCount++;
			if (!this._overflowing) {
				this._overflowing = true;
				internalLogger.warn({ queueLimit: this._queueLimit }, `${this._name}: queue full, discarding events`);
			}
			return;
		}
		this._overflowing = false;
		this._inQueue.push(ev);

		if (this._inQueue.length >= this._batchSize) {
			this.startFlush();
		} else {
			this.startTimeoutIfNotRunning();
		}
	}

	/**
	 * Writes everything queued. If a flush is already running, waits for it and then flushes
	 * whatever arrived meanwhile.
	 */
	public async flushQueue(): Promise<void> {
		while (this._flushing || this._inQueue.length > 0) {
			if (this._flushing) {
				await this._flushing;
			} else {
				this.startFlush();
			}
		}
	}

	public async close(): Promise<void> {
		this.cancelTimeout();
		await this.flushQueue();
	}

	private startTimeoutIfNotRunning(): void {
		if (this._inQueueTimeout) return;

		this._inQueueTimeout = setTimeout(() => {
			this._inQueueTimeout = undefined;
			this.startFlush();
		}, this._batchWaitMs);
	}

	private cancelTimeout(): void {
		if (this._inQueueTimeout) {
			clearTimeout(this._inQueueTimeout);
			this._inQueueTimeout = undefined;
		}
	}

	// no-op while a flush runs; the running flush picks up new events before it finishes
	private startFlush(): void {
		if (this._flushing || this._inQueue.length === 0) return;

		this.cancelTimeout();
		this._flushing = this.runFlush()
			.catch((e) => {
				internalLogger.error({ err: e, inQueueLength: this._inQueue.length }, `${this._name}: flush failed`);
			})
			.finally(() => {
				this._flushing = undefined;
			});
	}

	private async runFlush(): Promise<void> {
		while (this._inQueue.length > 0) {
			// no await between concat and reset, so nothing can be added to inQueue in between
			this._outQueue = this._outQueue.concat(this._inQueue);
			this._inQueue = [];

			while (this._outQueue.length > 0) {
				const batch = this._outQueue.splice(0, this._batchSize);
				try {
					await this._writeBatch(batch);
				} catch (e) {
					this._droppedCount += batch.length;
					internalLogger.error(
						{ err: e, batchLength: batch.length, outQueueLength: this._outQueue.length },
						`${this._name}: dropped batch after write error`
					);
				}
			}

			// a partial batch that arrived during the write waits for the timer, a full one goes now
			if (this._inQueue.length > 0 && this._inQueue.length < this._batchSize) {
				this.startTimeoutIfNotRunning();
				return;
			}
		}
	}
}
