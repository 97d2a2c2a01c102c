/**
 * Promise-chain mutex
 *
 * Serializes async critical sections: each runExclusive() call starts only
 * after every earlier call has settled, whether it resolved or threw.
 */

export class Mutex {
	private tail: Promise<unknown> = Promise.resolve();

	async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		const next = this.tail.then(() => fn());
		// tail never rejects
		this.tail = next.catch(() => undefined);
		return next;
	}
}
