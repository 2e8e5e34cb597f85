/**
 * In-process single-writer lock for the publish sequence.
 * Callers queue in arrival order; each task starts after the previous one
 * settles, whether it resolved or threw.
 *
 * @module services/publishLock
 */

export class PublishLock {
	private tail: Promise<void> = Promise.resolve();

	/**
	 * Runs `task` once every earlier task has settled.
	 *
	 * @example
	 * ```typescript
	 * const lock = new PublishLock();
	 * await lock.runExclusive(async () => {
	 *   // check, deliver, record
	 * });
	 * ```
	 */
	async runExclusive<T>(task: () => Promise<T>): Promise<T> {
		const previous = this.tail;
		let release: () => void = () => {};
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		this.tail = previous.then(() => current);

		await previous;
		try {
			return await task();
		} finally {
			release();
		}
	}
}
