/**
 * Event Queue
 *
 * Unbounded FIFO between the task runner (producer) and stream readers.
 * Each event is delivered to exactly one reader.
 */

type Waiter<T> = (item: T | undefined) => void;

export class EventQueue<T> {
	private readonly items: T[] = [];
	private readonly waiters: Waiter<T>[] = [];

	get size(): number {
		return this.items.length;
	}

	push(item: T): void {
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter(item);
			return;
		}
		this.items.push(item);
	}

	/** Next queued item without waiting */
	shift(): T | undefined {
		return this.items.shift();
	}

	/**
	 * Wait up to `timeoutMs` for the next item. Resolves undefined on timeout
	 * or when the signal aborts.
	 */
	next(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined> {
		if (this.items.length > 0) {
			return Promise.resolve(this.items.shift());
		}
		if (signal?.aborted) {
			return Promise.resolve(undefined);
		}

		return new Promise<T | undefined>((resolve) => {
			const finish: Waiter<T> = (item) => {
				clearTimeout(timer);
				signal?.removeEventListener("abort", onAbort);
				resolve(item);
			};
			const abandon = () => {
				const index = this.waiters.indexOf(finish);
				if (index !== -1) {
					this.waiters.splice(index, 1);
				}
				finish(undefined);
			};
			const onAbort = () => abandon();
			const timer = setTimeout(abandon, timeoutMs);

			signal?.addEventListener("abort", onAbort, { once: true });
			this.waiters.push(finish);
		});
	}

	/** Remove and return everything queued */
	drain(): T[] {
		return this.items.splice(0, this.items.length);
	}
}
