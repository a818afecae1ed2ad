/**
 * Readers/writer lock for async critical sections.
 *
 * - Any number of readers may hold the lock at once
 * - A writer holds it alone
 * - Waiting writers block new readers, so a steady read load cannot starve
 *   a write
 */

type Waiter = {
	kind: 'read' | 'write';
	resolve: () => void;
};

export class ReadWriteLock {
	private activeReaders = 0;
	private writing = false;
	private queue: Waiter[] = [];

	/**
	 * Run `fn` while holding a shared read lock.
	 */
	async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
		await this.acquire('read');
		try {
			return await fn();
		} finally {
			this.release('read');
		}
	}

	/**
	 * Run `fn` while holding the exclusive write lock.
	 * Keep `fn` short: no I/O while holding it.
	 */
	async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
		await this.acquire('write');
		try {
			return await fn();
		} finally {
			this.release('write');
		}
	}

	/** Number of readers currently inside the lock. */
	get readers(): number {
		return this.activeReaders;
	}

	/** Whether a writer currently holds the lock. */
	get isWriteLocked(): boolean {
		return this.writing;
	}

	private canAcquire(kind: 'read' | 'write'): boolean {
		if (kind === 'read') {
			return !this.writing && !this.queue.some(w => w.kind === 'write');
		}
		return !this.writing && this.activeReaders === 0;
	}

	private async acquire(kind: 'read' | 'write'): Promise<void> {
		if (this.queue.length === 0 && this.canAcquire(kind)) {
			this.grant(kind);
			return;
		}

		await new Promise<void>(resolve => {
			this.queue.push({kind, resolve});
		});
	}

	private grant(kind: 'read' | 'write'): void {
		if (kind === 'read') {
			this.activeReaders++;
		} else {
			this.writing = true;
		}
	}

	private release(kind: 'read' | 'write'): void {
		if (kind === 'read') {
			this.activeReaders--;
		} else {
			this.writing = false;
		}
		this.drain();
	}

	/**
	 * Wake queued waiters in FIFO order: either one writer, or every reader
	 * up to the next queued writer.
	 */
	private drain(): void {
		while (this.queue.length > 0) {
			const next = this.queue[0];
			if (!next) return;

			if (next.kind === 'write') {
				if (this.writing || this.activeReaders > 0) return;
				this.queue.shift();
				this.grant('write');
				next.resolve();
				return;
			}

			if (this.writing) return;
			this.queue.shift();
			this.grant('read');
			next.resolve();
		}
	}
}
