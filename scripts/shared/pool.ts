// ── Concurrency Semaphore ─────────────────────────────────────────────────

export class Semaphore {
	private permits: number;
	private queue: Array<() => void> = [];

	constructor(permits: number) {
		this.permits = Math.max(1, permits);
	}

	async acquire(): Promise<void> {
		if (this.permits > 0) {
			this.permits--;
			return;
		}
		return new Promise<void>((resolve) => {
			this.queue.push(resolve);
		});
	}

	release(): void {
		const next = this.queue.shift();
		if (next) {
			next();
		} else {
			this.permits++;
		}
	}
}

// ── Pool ──────────────────────────────────────────────────────────────────

/**
 * Run `task` over every item with at most `concurrency` tasks in flight.
 * Each task returns its own result; results come back in input order.
 * A rejected task rejects the whole pool.
 */
export const mapPool = async <T, R>(
	items: readonly T[],
	concurrency: number,
	task: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
	const semaphore = new Semaphore(concurrency);
	return Promise.all(
		items.map(async (item, index) => {
			await semaphore.acquire();
			try {
				return await task(item, index);
			} finally {
				semaphore.release();
			}
		}),
	);
};
