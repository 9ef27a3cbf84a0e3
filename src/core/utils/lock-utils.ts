/**
 * Counting semaphore. `acquire` resolves with a release function.
 */
export class Semaphore {
	private permits: number;
	private readonly queue: Array<() => void> = [];

	constructor(permits: number) {
		this.permits = permits;
	}

	async acquire(): Promise<() => void> {
		if (this.permits > 0) {
			this.permits--;
			return this.releaser();
		}

		return new Promise((resolve) => {
			this.queue.push(() => {
				this.permits--;
				resolve(this.releaser());
			});
		});
	}

	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		const release = await this.acquire();
		try {
			return await fn();
		} finally {
			release();
		}
	}

	private releaser(): () => void {
		let released = false;
		return () => {
			if (released) return;
			released = true;
			this.release();
		};
	}

	private release(): void {
		this.permits++;
		const next = this.queue.shift();
		if (next) {
			next();
		}
	}
}

/**
 * Many readers or one writer. Waiting writers block new readers so a rebuild is not starved.
 */
export class ReadWriteLock {
	private readers = 0;
	private writer = false;
	private readonly waitingWriters: Array<() => void> = [];
	private waitingReaders: Array<() => void> = [];

	async read<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquireRead();
		try {
			return await fn();
		} finally {
			this.releaseRead();
		}
	}

	async write<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquireWrite();
		try {
			return await fn();
		} finally {
			this.releaseWrite();
		}
	}

	private acquireRead(): Promise<void> {
		if (!this.writer && this.waitingWriters.length === 0) {
			this.readers++;
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.waitingReaders.push(() => {
				this.readers++;
				resolve();
			});
		});
	}

	private acquireWrite(): Promise<void> {
		if (!this.writer && this.readers === 0) {
			this.writer = true;
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.waitingWriters.push(() => {
				this.writer = true;
				resolve();
			});
		});
	}

	private releaseRead(): void {
		this.readers--;
		if (this.readers === 0) {
			this.wakeNext();
		}
	}

	private releaseWrite(): void {
		this.writer = false;
		this.wakeNext();
	}

	private wakeNext(): void {
		const writer = this.waitingWriters.shift();
		if (writer) {
			writer();
			return;
		}
		const readers = this.waitingReaders;
		this.waitingReaders = [];
		for (const reader of readers) {
			reader();
		}
	}
}

/**
 * One mutex per key, created on demand and dropped when idle.
 */
export class KeyedMutex {
	private readonly locks = new Map<string, { semaphore: Semaphore; users: number }>();

	async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
		let entry = this.locks.get(key);
		if (!entry) {
			entry = { semaphore: new Semaphore(1), users: 0 };
			this.locks.set(key, entry);
		}
		entry.users++;
		try {
			return await entry.semaphore.runExclusive(fn);
		} finally {
			entry.users--;
			if (entry.users === 0) {
				this.locks.delete(key);
			}
		}
	}
}
