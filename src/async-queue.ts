/**
 * Unbounded FIFO channel
 *
 * push() never waits. pop() resolves immediately when an item is buffered,
 * otherwise it parks until the next push. Waiters are served in the order
 * they called pop().
 */

export class AsyncQueue<T> {
	private items: Array<{ value: T }> = [];
	private waiters: Array<(item: T) => void> = [];

	push(item: T): void {
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter(item);
			return;
		}
		this.items.push({ value: item });
	}

	pop(): Promise<T> {
		const next = this.items.shift();
		if (next) {
			return Promise.resolve(next.value);
		}
		return new Promise<T>((resolve) => {
			this.waiters.push(resolve);
		});
	}

	/**
	 * Buffered items, oldest first
	 */
	snapshot(): T[] {
		return this.items.map((item) => item.value);
	}

	get size(): number {
		return this.items.length;
	}
}
